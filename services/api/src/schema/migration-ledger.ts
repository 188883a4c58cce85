/** One applied migration */
export interface LedgerEntry {
  id: number;
  unitPath: string;
  migration: string;
  batch: number;
  /** Plugin version the migration shipped with, `null` for base modules */
  version: string | null;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'id'>;

/**
 * Persistent record of applied migrations, grouped into batches.
 */
export interface MigrationLedger {
  repositoryExists(): Promise<boolean>;
  createRepository(): Promise<void>;
  deleteRepository(): Promise<void>;

  /** Names of the migrations applied for `unitPath` */
  getRan(unitPath: string): Promise<string[]>;

  /** Entries of the given paths in application order */
  getEntries(unitPaths: string[]): Promise<LedgerEntry[]>;

  getLastBatchNumber(): Promise<number>;
  log(entry: NewLedgerEntry): Promise<void>;
  delete(entry: Pick<LedgerEntry, 'unitPath' | 'migration'>): Promise<void>;
}
