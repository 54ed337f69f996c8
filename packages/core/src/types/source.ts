/**
 * Source and Mapping Types
 */

/** A data source (connector/crawler) configured in an organization */
export interface DataSource {
  id: string;
  name: string;
}

/** V1 wraps its source list in an envelope */
export interface V1SourceList {
  sources: DataSource[];
}

/** Binds raw ingested content to a named field on one source */
export interface MappingRule {
  field: string;
  content: string[];
}

/** Mapping configuration of one V2 source */
export interface V2SourceMappings {
  common: {
    rules: MappingRule[];
  };
}

/** A source present by name in both organizations */
export interface CommonSource {
  /** Lower-cased name shared by both sides */
  name: string;
  /** Id of the source in the source organization */
  sourceId: string;
  /** Id of the source in the target organization */
  targetId: string;
}
