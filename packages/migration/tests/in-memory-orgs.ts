import type {
  DataSource,
  ISourceOrgService,
  ITargetOrgService,
  MappingRule,
  V1FieldDefinition,
  V1SourceList,
  V2FieldDefinition,
  V2FieldList,
  V2SourceMappings,
} from '@fieldport/core';

export function v1Field(overrides: Partial<V1FieldDefinition> & { name: string }): V1FieldDefinition {
  return {
    fieldType: 'STRING',
    contentType: 'TEXT',
    fieldQueries: true,
    freeTextQueries: false,
    facet: false,
    multivalueFacet: false,
    sort: false,
    displayField: true,
    fieldOrigin: 'CUSTOM',
    sourceId: 'v1-web',
    metadataName: overrides.name.toLowerCase(),
    ...overrides,
  };
}

export class InMemorySourceOrg implements ISourceOrgService {
  constructor(
    private readonly fields: V1FieldDefinition[],
    private readonly sources: DataSource[]
  ) {}

  async fieldsGet(): Promise<V1FieldDefinition[]> {
    return this.fields.map((field) => ({ ...field }));
  }

  async sourcesGet(): Promise<V1SourceList> {
    return { sources: this.sources.map((source) => ({ ...source })) };
  }
}

export type TargetCall =
  | { op: 'fieldsGet' }
  | { op: 'fieldsCreateBatch'; names: string[] }
  | { op: 'sourcesGet' }
  | { op: 'mappingsGet'; sourceId: string }
  | { op: 'mappingsCommonAdd'; sourceId: string; rebuild: boolean; rule: MappingRule };

/**
 * Target organization holding its state in memory; writes are applied so a second run sees them
 */
export class InMemoryTargetOrg implements ITargetOrgService {
  readonly calls: TargetCall[] = [];
  readonly fields: V2FieldDefinition[] = [];
  readonly rules = new Map<string, MappingRule[]>();
  failOn?: TargetCall['op'];

  constructor(
    readonly sources: DataSource[],
    options: { fields?: V2FieldDefinition[]; rules?: Record<string, MappingRule[]> } = {}
  ) {
    this.fields.push(...(options.fields ?? []));
    for (const source of sources) {
      this.rules.set(source.id, [...(options.rules?.[source.id] ?? [])]);
    }
  }

  private record(call: TargetCall): void {
    this.calls.push(call);
    if (this.failOn === call.op) {
      throw new Error(`${call.op} failed`);
    }
  }

  callsOf<K extends TargetCall['op']>(op: K): Extract<TargetCall, { op: K }>[] {
    return this.calls.filter((call): call is Extract<TargetCall, { op: K }> => call.op === op);
  }

  async fieldsGet(): Promise<V2FieldList> {
    this.record({ op: 'fieldsGet' });
    return { items: this.fields.map((field) => ({ ...field })) };
  }

  async fieldsCreateBatch(fields: V2FieldDefinition[]): Promise<void> {
    this.record({ op: 'fieldsCreateBatch', names: fields.map((field) => field.name) });
    this.fields.push(...fields);
  }

  async sourcesGet(): Promise<DataSource[]> {
    this.record({ op: 'sourcesGet' });
    return this.sources.map((source) => ({ ...source }));
  }

  async mappingsGet(sourceId: string): Promise<V2SourceMappings> {
    this.record({ op: 'mappingsGet', sourceId });
    return { common: { rules: [...(this.rules.get(sourceId) ?? [])] } };
  }

  async mappingsCommonAdd(sourceId: string, rebuild: boolean, rule: MappingRule): Promise<void> {
    this.record({ op: 'mappingsCommonAdd', sourceId, rebuild, rule });
    const rules = this.rules.get(sourceId);
    if (!rules) {
      throw new Error(`Unknown source ${sourceId}`);
    }
    rules.push(rule);
  }
}
