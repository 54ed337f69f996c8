export { MigrationError } from './migration-error.js';
export type { MigrationErrorCode, MigrationErrorDetails } from './migration-error.js';
