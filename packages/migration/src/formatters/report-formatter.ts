/**
 * Migration Report Formatter
 */

import type { MigrationReport } from '../pipeline/migration-pipeline.js';

const SAMPLE_SIZE = 10;

function pushSample(lines: string[], title: string, items: string[]): void {
  if (items.length === 0) return;

  lines.push(`### ${title} (${items.length})`);
  for (const item of items.slice(0, SAMPLE_SIZE)) {
    lines.push(`- ${item}`);
  }
  if (items.length > SAMPLE_SIZE) {
    lines.push(`... and ${items.length - SAMPLE_SIZE} more`);
  }
  lines.push('');
}

/**
 * Format a migration report as plain text
 */
export function formatMigrationReport(report: MigrationReport): string {
  const lines: string[] = [];
  const { fields, mappings } = report;

  lines.push(report.dryRun ? '## Field Migration Report (dry run)' : '## Field Migration Report');
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push('');

  lines.push('### Summary');
  lines.push(`- Source Fields: ${report.sourceFieldCount}`);
  lines.push(`- User Fields: ${report.userFieldCount}`);
  lines.push(`- Unique Names: ${report.acceptedNames.length}`);
  lines.push(`- Conflicting Names: ${report.conflictingNames.length}`);
  lines.push(`- Fields Created: ${fields.created.length}`);
  lines.push(`- Fields Already Present: ${fields.skipped.length}`);
  lines.push(`- Common Sources: ${mappings.commonSources.length}`);
  lines.push(`- Mappings Created: ${mappings.created.length}`);
  lines.push(`- Mappings Skipped: ${mappings.skipped.length}`);
  lines.push('');

  if (report.plannedWrites) {
    const { fieldBatches, mappingAdds } = report.plannedWrites;
    const fieldCount = fieldBatches.reduce((sum, batch) => sum + batch.length, 0);
    lines.push('### Planned Writes (not sent)');
    lines.push(`- Field Batches: ${fieldBatches.length} (${fieldCount} fields)`);
    lines.push(`- Mapping Rules: ${mappingAdds.length}`);
    lines.push('');
  }

  pushSample(lines, 'Conflicting Names', report.conflictingNames);
  pushSample(lines, 'Created Fields', fields.created.map((field) => `${field.name} (${field.type})`));
  pushSample(
    lines,
    'Created Mappings',
    mappings.created.map((m) => `${m.rule.field} ← ${m.rule.content.join(' ')} on ${m.sourceName}`)
  );
  pushSample(
    lines,
    'Skipped Mappings',
    mappings.skipped.map((m) => `${m.field}: ${m.reason}${m.sourceName ? ` (${m.sourceName})` : ''}`)
  );

  lines.push('---');
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
