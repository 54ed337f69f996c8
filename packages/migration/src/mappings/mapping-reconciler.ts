/**
 * MappingReconciler
 *
 * Recreates the source organization's field mappings on the matching target sources.
 */

import {
  indexBy,
  normalizeName,
  type CommonSource,
  type DataSource,
  type ITargetOrgService,
  type MappingRule,
  type V1FieldDefinition,
  type V1SourceList,
} from '@fieldport/core';
import { MigrationError } from '../errors/index.js';
import { NULL_DIAGNOSTIC_SINK, type DiagnosticSink } from '../diagnostics/types.js';
import { matchCommonSources } from './source-matcher.js';

export interface MappingReconcilerOptions {
  /** Ask the target to rebuild a source after each added rule (default: false) */
  rebuild?: boolean;
  diagnostics?: DiagnosticSink;
}

export interface MappingReconciliationInput {
  /** Sources of the source organization */
  sourceSources: V1SourceList;
  /** Every member of every valid field group */
  fields: readonly V1FieldDefinition[];
  /** Sources of the target organization */
  targetSources: readonly DataSource[];
  target: ITargetOrgService;
}

export interface CreatedMapping {
  rule: MappingRule;
  sourceName: string;
  targetSourceId: string;
}

export type MappingSkipReason = 'unknown-source' | 'no-target-source' | 'already-mapped';

export interface SkippedMapping {
  field: string;
  reason: MappingSkipReason;
  sourceName?: string;
}

export interface MappingReconciliationResult {
  commonSources: CommonSource[];
  created: CreatedMapping[];
  skipped: SkippedMapping[];
}

/**
 * Build the rule that feeds a field from its metadata
 */
export function buildMappingRule(field: V1FieldDefinition): MappingRule {
  return {
    content: [`%[${field.metadataName}]`],
    field: field.name,
  };
}

export class MappingReconciler {
  private readonly rebuild: boolean;
  private readonly diagnostics: DiagnosticSink;

  constructor(options: MappingReconcilerOptions = {}) {
    this.rebuild = options.rebuild ?? false;
    this.diagnostics = options.diagnostics ?? NULL_DIAGNOSTIC_SINK;
  }

  async reconcile(input: MappingReconciliationInput): Promise<MappingReconciliationResult> {
    const { sourceSources, fields, targetSources, target } = input;

    const common = matchCommonSources(sourceSources.sources, targetSources);
    const commonSources = Array.from(common.values());
    const result: MappingReconciliationResult = { commonSources, created: [], skipped: [] };

    if (common.size === 0) {
      this.diagnostics.report({ kind: 'no-common-sources' });
      return result;
    }
    this.diagnostics.report({ kind: 'common-sources', sources: commonSources });

    // Snapshot taken once; not refreshed as rules are added below
    const existingRules = await this.loadExistingRules(commonSources, target);
    const sourceById = indexBy(sourceSources.sources, (source) => normalizeName(source.id));

    for (const field of fields) {
      const source = field.sourceId === null ? undefined : sourceById.get(normalizeName(field.sourceId));
      if (!source) {
        result.skipped.push({ field: field.name, reason: 'unknown-source' });
        this.diagnostics.report({
          kind: 'mapping-unknown-source',
          field: field.name,
          sourceId: field.sourceId,
        });
        continue;
      }

      const counterpart = common.get(normalizeName(source.name));
      if (!counterpart) {
        result.skipped.push({ field: field.name, reason: 'no-target-source', sourceName: source.name });
        this.diagnostics.report({
          kind: 'mapping-no-target-source',
          field: field.name,
          sourceName: source.name,
        });
        continue;
      }

      const rules = existingRules.get(counterpart.targetId);
      if (!rules) {
        throw new MigrationError({
          code: 'MAPPINGS_NOT_LOADED',
          message: `Mappings of target source '${counterpart.targetId}' were not loaded`,
        });
      }

      const rule = buildMappingRule(field);
      if (rules.has(normalizeName(rule.field))) {
        result.skipped.push({ field: field.name, reason: 'already-mapped', sourceName: source.name });
        this.diagnostics.report({ kind: 'mapping-exists', rule, sourceName: source.name });
        continue;
      }

      this.diagnostics.report({
        kind: 'mapping-create',
        rule,
        sourceName: source.name,
        targetSourceId: counterpart.targetId,
      });
      await target.mappingsCommonAdd(counterpart.targetId, this.rebuild, rule);
      result.created.push({ rule, sourceName: source.name, targetSourceId: counterpart.targetId });
    }

    return result;
  }

  /**
   * Fetch the rules of every common source once, keyed by target id then lower-cased field
   */
  private async loadExistingRules(
    commonSources: readonly CommonSource[],
    target: ITargetOrgService
  ): Promise<Map<string, Map<string, MappingRule>>> {
    const byTargetId = new Map<string, Map<string, MappingRule>>();
    for (const source of commonSources) {
      const mappings = await target.mappingsGet(source.targetId);
      byTargetId.set(
        source.targetId,
        indexBy(mappings.common.rules, (rule) => normalizeName(rule.field))
      );
    }
    return byTargetId;
  }
}
