/**
 * @fieldport/migration
 *
 * Deduplicates user fields, copies them to the target organization
 * and recreates their mappings on matching sources.
 */

import { MigrationPipeline as _MigrationPipeline } from './pipeline/migration-pipeline.js';
import type { MigrationPipelineOptions } from './pipeline/migration-pipeline.js';

// Deduplication
export { FieldDeduplicator, filterUserFields } from './dedup/field-deduplicator.js';
export type { DeduplicationResult, SkippedFieldGroup } from './dedup/field-deduplicator.js';

// Fields
export { FieldMigrator } from './fields/field-migrator.js';
export type {
  FieldMigratorOptions,
  FieldMigrationResult,
  FieldTranslator,
} from './fields/field-migrator.js';

// Mappings
export { MappingReconciler, buildMappingRule } from './mappings/mapping-reconciler.js';
export type {
  MappingReconcilerOptions,
  MappingReconciliationInput,
  MappingReconciliationResult,
  CreatedMapping,
  SkippedMapping,
  MappingSkipReason,
} from './mappings/mapping-reconciler.js';
export { matchCommonSources } from './mappings/source-matcher.js';

// Pipeline
export { MigrationPipeline } from './pipeline/migration-pipeline.js';
export type { MigrationPipelineOptions, MigrationReport } from './pipeline/migration-pipeline.js';
export { DryRunTargetService } from './pipeline/dry-run-target.js';
export type { PlannedWrites, RecordedMappingAdd } from './pipeline/dry-run-target.js';

// Diagnostics
export {
  CollectingDiagnosticSink,
  NULL_DIAGNOSTIC_SINK,
} from './diagnostics/types.js';
export type {
  MigrationDiagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
  DiagnosticSink,
} from './diagnostics/types.js';

// Formatters
export { formatDiagnostic, severityOf } from './formatters/diagnostic-formatter.js';
export { formatMigrationReport } from './formatters/report-formatter.js';

// Errors
export { MigrationError } from './errors/index.js';
export type { MigrationErrorCode, MigrationErrorDetails } from './errors/index.js';

/**
 * Factory function to create a MigrationPipeline
 */
export function createMigrationPipeline(options: MigrationPipelineOptions): _MigrationPipeline {
  return new _MigrationPipeline(options);
}
