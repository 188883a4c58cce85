export const MIGRATION_LEDGER = 'MIGRATION_LEDGER';
export const MIGRATION_RUNNER = 'MIGRATION_RUNNER';
