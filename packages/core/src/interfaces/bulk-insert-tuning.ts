/**
 * Database-specific settings applied around one bulk import
 */
export interface BulkInsertTuning {
  /** Called before the import transaction begins */
  before(): void;

  /**
   * Called once the transaction has ended
   *
   * `committed` is false after a rollback; maintenance such as VACUUM only
   * runs after a commit.
   */
  after(outcome: { committed: boolean; vacuum: boolean }): void;
}
