/**
 * Organization Service Interfaces
 *
 * The migration core talks to both organizations only through these
 * capabilities. Transport, authentication and pagination live behind them.
 */

import type {
  V1FieldDefinition,
  V2FieldDefinition,
  V2FieldList,
  V1SourceList,
  DataSource,
  MappingRule,
  V2SourceMappings,
} from '../types/index.js';

/**
 * Read-only access to the source (V1) organization
 */
export interface ISourceOrgService {
  /**
   * List every field, system and user-defined
   * @throws ConnectorError if the request fails
   */
  fieldsGet(): Promise<V1FieldDefinition[]>;

  /**
   * List every data source
   * @throws ConnectorError if the request fails
   */
  sourcesGet(): Promise<V1SourceList>;
}

/**
 * Access to the target (V2) organization
 */
export interface ITargetOrgService {
  /** List every field (all pages) */
  fieldsGet(): Promise<V2FieldList>;

  /**
   * Create several fields in one all-or-nothing call
   * @throws ConnectorError if the request fails
   */
  fieldsCreateBatch(fields: V2FieldDefinition[]): Promise<void>;

  /** List every data source */
  sourcesGet(): Promise<DataSource[]>;

  /** Get the mapping configuration of one source */
  mappingsGet(sourceId: string): Promise<V2SourceMappings>;

  /**
   * Add one rule to the common mappings of a source
   * @param rebuild - Whether the target should rebuild the source afterwards
   * @throws ConnectorError if the request fails
   */
  mappingsCommonAdd(sourceId: string, rebuild: boolean, rule: MappingRule): Promise<void>;
}
