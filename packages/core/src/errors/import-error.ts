/**
 * Errors of the importer and of dump files
 */

import { BaseError, type ErrorDetails } from './base-error.js';

export type ImportErrorCode =
  /** Recoverable: accumulated, the relation row is skipped */
  | 'DANGLING_REFERENCE'
  | 'MALFORMED_ELEMENT'
  | 'MALFORMED_DOCUMENT'
  | 'FILE_NOT_FOUND'
  | 'FILE_IO'
  | 'CONFLICTING_ELEMENTS'
  | 'SCHEMA_MISSING'
  | 'DATABASE_ERROR';

export type ImportErrorDetails = ErrorDetails<ImportErrorCode>;

export interface DanglingReferenceContext {
  relationId: string;
  originId: string;
  relationName: string;
  targetId: string;
}

export class ImportError extends BaseError<ImportErrorCode> {
  constructor(details: ImportErrorDetails) {
    super('ImportError', details);
  }

  static danglingReference(ref: DanglingReferenceContext): ImportError {
    return new ImportError({
      code: 'DANGLING_REFERENCE',
      message: `Relation "${ref.relationName}" of element ${ref.originId} targets unknown element ${ref.targetId}`,
      suggestion: 'Check that the dump contains the complete model.',
      context: { ...ref },
    });
  }

  static malformedElement(index: number, reason: string, id?: string): ImportError {
    return new ImportError({
      code: 'MALFORMED_ELEMENT',
      message: `Element #${index}${id ? ` (${id})` : ''} is malformed: ${reason}`,
      suggestion: 'Every element must be a JSON object with non-empty "@id" and "@type" strings.',
      context: { index, id },
    });
  }
}
