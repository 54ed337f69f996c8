/**
 * Diagnostic Formatter
 *
 * Renders diagnostics as the single lines operators read in the run output.
 */

import type { MigrationDiagnostic, DiagnosticSeverity } from '../diagnostics/types.js';

const SKIP_KINDS: ReadonlySet<MigrationDiagnostic['kind']> = new Set([
  'field-conflict',
  'field-exists',
  'no-common-sources',
  'mapping-unknown-source',
  'mapping-no-target-source',
  'mapping-exists',
]);

/**
 * Skips are warnings, everything else is informational
 */
export function severityOf(diagnostic: MigrationDiagnostic): DiagnosticSeverity {
  return SKIP_KINDS.has(diagnostic.kind) ? 'warn' : 'info';
}

export function formatDiagnostic(diagnostic: MigrationDiagnostic): string {
  switch (diagnostic.kind) {
    case 'field-conflict':
      return (
        `SKIPPING FIELD '${diagnostic.field}'. Found fields in the source organization with the same name ` +
        `but different configurations (${diagnostic.attribute} differs): ${JSON.stringify(diagnostic.records)}`
      );
    case 'field-exists':
      return `SKIPPING FIELD '${diagnostic.field.name}' because it already exists in the target organization: ${JSON.stringify(diagnostic.field)}`;
    case 'field-create':
      return `ADD FIELD: ${JSON.stringify(diagnostic.field)}`;
    case 'common-sources':
      return `Common source names (${diagnostic.sources.length}): ${JSON.stringify(diagnostic.sources)}`;
    case 'no-common-sources':
      return 'No common source names between the source and target organizations. Cannot copy mappings.';
    case 'mapping-unknown-source':
      return `SKIPPING MAPPING for '${diagnostic.field}' because its source id '${diagnostic.sourceId ?? ''}' is not a source of the source organization`;
    case 'mapping-no-target-source':
      return `SKIPPING MAPPING for '${diagnostic.field}' because source '${diagnostic.sourceName}' does not exist in the target organization`;
    case 'mapping-exists':
      return `SKIPPING MAPPING '${JSON.stringify(diagnostic.rule)}' because it's already present in source '${diagnostic.sourceName}'`;
    case 'mapping-create':
      return `ADD MAPPING: ${JSON.stringify(diagnostic.rule)} on source '${diagnostic.sourceName}' (${diagnostic.targetSourceId})`;
    case 'stage-complete':
      return diagnostic.stage === 'fields'
        ? `All user fields copied (${diagnostic.created} created, ${diagnostic.skipped} skipped).`
        : `All mappings created (${diagnostic.created} created, ${diagnostic.skipped} skipped).`;
    default: {
      const exhaustive: never = diagnostic;
      throw new Error(`Unknown diagnostic: ${JSON.stringify(exhaustive)}`);
    }
  }
}
