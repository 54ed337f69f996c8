/**
 * Diagnostic Types
 *
 * One event per skip/create decision. Operators audit a run from these.
 */

import type {
  V1FieldDefinition,
  V2FieldDefinition,
  FieldConfigAttribute,
  CommonSource,
  MappingRule,
} from '@fieldport/core';

export type MigrationDiagnostic =
  | {
      kind: 'field-conflict';
      field: string;
      /** First attribute found to differ between two consecutive records */
      attribute: FieldConfigAttribute;
      records: V1FieldDefinition[];
    }
  | { kind: 'field-exists'; field: V2FieldDefinition }
  | { kind: 'field-create'; field: V2FieldDefinition }
  | { kind: 'common-sources'; sources: CommonSource[] }
  | { kind: 'no-common-sources' }
  | { kind: 'mapping-unknown-source'; field: string; sourceId: string | null }
  | { kind: 'mapping-no-target-source'; field: string; sourceName: string }
  | { kind: 'mapping-exists'; rule: MappingRule; sourceName: string }
  | { kind: 'mapping-create'; rule: MappingRule; sourceName: string; targetSourceId: string }
  | { kind: 'stage-complete'; stage: 'fields' | 'mappings'; created: number; skipped: number };

export type DiagnosticKind = MigrationDiagnostic['kind'];

export type DiagnosticSeverity = 'info' | 'warn';

export interface DiagnosticSink {
  report(diagnostic: MigrationDiagnostic): void;
}

/** Discards everything */
export const NULL_DIAGNOSTIC_SINK: DiagnosticSink = {
  report: () => undefined,
};

/**
 * Keeps every diagnostic in memory, in order
 */
export class CollectingDiagnosticSink implements DiagnosticSink {
  readonly diagnostics: MigrationDiagnostic[] = [];

  report(diagnostic: MigrationDiagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  ofKind<K extends DiagnosticKind>(kind: K): Extract<MigrationDiagnostic, { kind: K }>[] {
    return this.diagnostics.filter(
      (d): d is Extract<MigrationDiagnostic, { kind: K }> => d.kind === kind
    );
  }
}
