/**
 * DryRunTargetService
 *
 * Wraps a target organization: reads go through, writes are only recorded.
 */

import type {
  ITargetOrgService,
  V2FieldDefinition,
  V2FieldList,
  DataSource,
  MappingRule,
  V2SourceMappings,
} from '@fieldport/core';

export interface RecordedMappingAdd {
  sourceId: string;
  rebuild: boolean;
  rule: MappingRule;
}

/** Writes a dry run would have sent, in order */
export interface PlannedWrites {
  fieldBatches: V2FieldDefinition[][];
  mappingAdds: RecordedMappingAdd[];
}

export class DryRunTargetService implements ITargetOrgService {
  private readonly fieldBatches: V2FieldDefinition[][] = [];
  private readonly mappingAdds: RecordedMappingAdd[] = [];

  constructor(private readonly inner: ITargetOrgService) {}

  fieldsGet(): Promise<V2FieldList> {
    return this.inner.fieldsGet();
  }

  async fieldsCreateBatch(fields: V2FieldDefinition[]): Promise<void> {
    this.fieldBatches.push([...fields]);
  }

  sourcesGet(): Promise<DataSource[]> {
    return this.inner.sourcesGet();
  }

  mappingsGet(sourceId: string): Promise<V2SourceMappings> {
    return this.inner.mappingsGet(sourceId);
  }

  async mappingsCommonAdd(sourceId: string, rebuild: boolean, rule: MappingRule): Promise<void> {
    this.mappingAdds.push({ sourceId, rebuild, rule });
  }

  plannedWrites(): PlannedWrites {
    return {
      fieldBatches: this.fieldBatches.map((batch) => [...batch]),
      mappingAdds: [...this.mappingAdds],
    };
  }
}
