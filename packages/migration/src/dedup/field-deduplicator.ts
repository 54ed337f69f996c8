/**
 * FieldDeduplicator
 *
 * Collapses the source organization's field list into uniquely named groups.
 * A name shared by records with different configurations is dropped entirely.
 */

import {
  FIELD_CONFIG_ATTRIBUTES,
  USER_FIELD_ORIGIN,
  type FieldConfigAttribute,
  type UniqueFieldGroup,
  type V1FieldDefinition,
} from '@fieldport/core';
import { NULL_DIAGNOSTIC_SINK, type DiagnosticSink } from '../diagnostics/types.js';

export interface SkippedFieldGroup extends UniqueFieldGroup {
  /** First attribute that differed */
  attribute: FieldConfigAttribute;
}

export interface DeduplicationResult {
  /** Consistent groups, in order of first appearance of their name */
  groups: UniqueFieldGroup[];
  /** Groups dropped because their records disagree */
  skipped: SkippedFieldGroup[];
}

/**
 * Keep only fields created by users of the organization
 */
export function filterUserFields(fields: readonly V1FieldDefinition[]): V1FieldDefinition[] {
  return fields.filter((field) => field.fieldOrigin === USER_FIELD_ORIGIN);
}

export class FieldDeduplicator {
  constructor(private readonly diagnostics: DiagnosticSink = NULL_DIAGNOSTIC_SINK) {}

  deduplicate(fields: readonly V1FieldDefinition[]): DeduplicationResult {
    const groups: UniqueFieldGroup[] = [];
    const skipped: SkippedFieldGroup[] = [];

    for (const group of this.groupByName(fields)) {
      const attribute = this.findConfigMismatch(group.fields);
      if (attribute === null) {
        groups.push(group);
        continue;
      }

      skipped.push({ ...group, attribute });
      this.diagnostics.report({
        kind: 'field-conflict',
        field: group.name,
        attribute,
        records: group.fields,
      });
    }

    return { groups, skipped };
  }

  /**
   * Group by exact name, keeping every record
   */
  groupByName(fields: readonly V1FieldDefinition[]): UniqueFieldGroup[] {
    const byName = new Map<string, V1FieldDefinition[]>();
    for (const field of fields) {
      const members = byName.get(field.name);
      if (members) {
        members.push(field);
      } else {
        byName.set(field.name, [field]);
      }
    }

    return Array.from(byName, ([name, members]) => ({ name, fields: members }));
  }

  /**
   * Compare consecutive records; returns the first differing attribute, or null
   */
  findConfigMismatch(fields: readonly V1FieldDefinition[]): FieldConfigAttribute | null {
    for (let i = 1; i < fields.length; i++) {
      const previous = fields[i - 1];
      const current = fields[i];
      if (!previous || !current) continue;

      const attribute = FIELD_CONFIG_ATTRIBUTES.find((attr) => previous[attr] !== current[attr]);
      if (attribute !== undefined) {
        return attribute;
      }
    }
    return null;
  }
}
