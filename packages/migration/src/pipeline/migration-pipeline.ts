/**
 * Migration Pipeline
 *
 * Runs the whole copy strictly in order:
 * user fields → deduplicated groups → created fields → created mappings.
 * Any remote failure propagates and ends the run; nothing already written is rolled back.
 */

import type { ISourceOrgService, ITargetOrgService } from '@fieldport/core';
import { FieldDeduplicator, filterUserFields } from '../dedup/field-deduplicator.js';
import { FieldMigrator, type FieldMigrationResult, type FieldTranslator } from '../fields/field-migrator.js';
import { MappingReconciler, type MappingReconciliationResult } from '../mappings/mapping-reconciler.js';
import { DryRunTargetService, type PlannedWrites } from './dry-run-target.js';
import { NULL_DIAGNOSTIC_SINK, type DiagnosticSink } from '../diagnostics/types.js';

export interface MigrationPipelineOptions {
  source: ISourceOrgService;
  target: ITargetOrgService;
  diagnostics?: DiagnosticSink;
  /** Record writes instead of sending them */
  dryRun?: boolean;
  /** Rebuild target sources after each added mapping rule */
  rebuildSources?: boolean;
  translate?: FieldTranslator;
}

export interface MigrationReport {
  timestamp: Date;
  dryRun: boolean;
  /** Fields returned by the source organization */
  sourceFieldCount: number;
  /** Of those, user-defined */
  userFieldCount: number;
  /** Names kept after deduplication */
  acceptedNames: string[];
  /** Names dropped because of conflicting configurations */
  conflictingNames: string[];
  fields: FieldMigrationResult;
  mappings: MappingReconciliationResult;
  /** Writes held back; only set on a dry run */
  plannedWrites?: PlannedWrites;
  processingTimeMs: number;
}

export class MigrationPipeline {
  private readonly source: ISourceOrgService;
  private readonly target: ITargetOrgService;
  private readonly diagnostics: DiagnosticSink;
  private readonly dryRun: boolean;
  private readonly dryRunTarget?: DryRunTargetService;
  private readonly deduplicator: FieldDeduplicator;
  private readonly fieldMigrator: FieldMigrator;
  private readonly mappingReconciler: MappingReconciler;

  constructor(options: MigrationPipelineOptions) {
    this.source = options.source;
    this.dryRun = options.dryRun ?? false;
    if (this.dryRun) {
      this.dryRunTarget = new DryRunTargetService(options.target);
    }
    this.target = this.dryRunTarget ?? options.target;
    this.diagnostics = options.diagnostics ?? NULL_DIAGNOSTIC_SINK;
    this.deduplicator = new FieldDeduplicator(this.diagnostics);
    this.fieldMigrator = new FieldMigrator({
      translate: options.translate,
      diagnostics: this.diagnostics,
    });
    this.mappingReconciler = new MappingReconciler({
      rebuild: options.rebuildSources,
      diagnostics: this.diagnostics,
    });
  }

  async run(): Promise<MigrationReport> {
    const startTime = Date.now();

    const sourceFields = await this.source.fieldsGet();
    const userFields = filterUserFields(sourceFields);
    const { groups, skipped } = this.deduplicator.deduplicate(userFields);

    const fields = await this.fieldMigrator.migrate(groups, this.target);
    this.diagnostics.report({
      kind: 'stage-complete',
      stage: 'fields',
      created: fields.created.length,
      skipped: fields.skipped.length + skipped.length,
    });

    const mappingFields = groups.flatMap((group) => group.fields);
    const sourceSources = await this.source.sourcesGet();
    const targetSources = await this.target.sourcesGet();
    const mappings = await this.mappingReconciler.reconcile({
      sourceSources,
      fields: mappingFields,
      targetSources,
      target: this.target,
    });
    this.diagnostics.report({
      kind: 'stage-complete',
      stage: 'mappings',
      created: mappings.created.length,
      skipped: mappings.skipped.length,
    });

    return {
      timestamp: new Date(startTime),
      dryRun: this.dryRun,
      sourceFieldCount: sourceFields.length,
      userFieldCount: userFields.length,
      acceptedNames: groups.map((group) => group.name),
      conflictingNames: skipped.map((group) => group.name),
      fields,
      mappings,
      plannedWrites: this.dryRunTarget?.plannedWrites(),
      processingTimeMs: Date.now() - startTime,
    };
  }
}
