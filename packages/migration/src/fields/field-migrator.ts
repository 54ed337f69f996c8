/**
 * FieldMigrator
 *
 * Creates in the target organization every deduplicated field it does not have yet.
 */

import type {
  ITargetOrgService,
  UniqueFieldGroup,
  V1FieldDefinition,
  V2FieldDefinition,
} from '@fieldport/core';
import { translateV1Field } from '@fieldport/connector-cloud';
import { MigrationError } from '../errors/index.js';
import { NULL_DIAGNOSTIC_SINK, type DiagnosticSink } from '../diagnostics/types.js';

export type FieldTranslator = (field: V1FieldDefinition) => V2FieldDefinition;

export interface FieldMigratorOptions {
  /** V1 → V2 projection (default: translateV1Field) */
  translate?: FieldTranslator;
  diagnostics?: DiagnosticSink;
}

export interface FieldMigrationResult {
  /** Fields sent in the batch create call */
  created: V2FieldDefinition[];
  /** Fields whose name already existed in the target */
  skipped: V2FieldDefinition[];
}

export class FieldMigrator {
  private readonly translate: FieldTranslator;
  private readonly diagnostics: DiagnosticSink;

  constructor(options: FieldMigratorOptions = {}) {
    this.translate = options.translate ?? translateV1Field;
    this.diagnostics = options.diagnostics ?? NULL_DIAGNOSTIC_SINK;
  }

  async migrate(
    groups: readonly UniqueFieldGroup[],
    target: ITargetOrgService
  ): Promise<FieldMigrationResult> {
    const translated = groups.map((group) => this.translate(this.representative(group)));

    const existing = await target.fieldsGet();
    const existingNames = new Set(existing.items.map((field) => field.name));

    const created: V2FieldDefinition[] = [];
    const skipped: V2FieldDefinition[] = [];

    for (const field of translated) {
      if (existingNames.has(field.name)) {
        skipped.push(field);
        this.diagnostics.report({ kind: 'field-exists', field });
      } else {
        created.push(field);
      }
    }

    if (created.length > 0) {
      for (const field of created) {
        this.diagnostics.report({ kind: 'field-create', field });
      }
      await target.fieldsCreateBatch(created);
    }

    return { created, skipped };
  }

  private representative(group: UniqueFieldGroup): V1FieldDefinition {
    const first = group.fields[0];
    if (!first) {
      throw new MigrationError({
        code: 'EMPTY_FIELD_GROUP',
        message: `Field group '${group.name}' has no records`,
        suggestion: 'Build groups with FieldDeduplicator.deduplicate().',
      });
    }
    return first;
  }
}
