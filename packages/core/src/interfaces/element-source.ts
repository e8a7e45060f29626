/**
 * Anything the importer can take elements from: a dump file or the API
 */
export interface ElementSource {
  /** Short description for log lines, e.g. a file path or a URL */
  describe(): string;

  /** Raw element records, in source order; validated by the importer */
  readElements(): Promise<unknown[]>;
}
