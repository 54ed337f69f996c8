/**
 * Field Types
 *
 * Field definitions as stored in the source (V1) and target (V2) organizations.
 */

/** Origin of a V1 field; only CUSTOM fields are user-defined */
export type FieldOrigin = 'CUSTOM' | 'SYSTEM' | (string & {});

/** Field definition as returned by the source organization */
export interface V1FieldDefinition {
  name: string;
  fieldType: string;
  contentType: string;
  fieldQueries: boolean;
  freeTextQueries: boolean;
  facet: boolean;
  multivalueFacet: boolean;
  sort: boolean;
  displayField: boolean;
  fieldOrigin: FieldOrigin;
  /** Source the field is populated from (null when not tied to a source) */
  sourceId: string | null;
  /** Metadata key the field reads its value from */
  metadataName: string;
}

/**
 * Attributes that must agree between V1 fields sharing a name.
 * Order is the order in which mismatches are reported.
 */
export const FIELD_CONFIG_ATTRIBUTES = [
  'fieldType',
  'contentType',
  'fieldQueries',
  'freeTextQueries',
  'facet',
  'multivalueFacet',
  'sort',
  'displayField',
] as const satisfies ReadonlyArray<keyof V1FieldDefinition>;

export type FieldConfigAttribute = (typeof FIELD_CONFIG_ATTRIBUTES)[number];

/** Field types understood by the target organization */
export type V2FieldType = 'STRING' | 'LONG' | 'LONG_64' | 'DOUBLE' | 'DATE' | (string & {});

/** Field definition in the target organization's schema */
export interface V2FieldDefinition {
  name: string;
  type: V2FieldType;
  description: string;
  facet: boolean;
  multiValueFacet: boolean;
  sort: boolean;
  includeInQuery: boolean;
  includeInResults: boolean;
  mergeWithLexicon: boolean;
}

/** V2 field list, fully materialized across pages */
export interface V2FieldList {
  items: V2FieldDefinition[];
}

/** All V1 fields sharing one name */
export interface UniqueFieldGroup {
  name: string;
  /** Every member, in original order; the first one is the representative */
  fields: V1FieldDefinition[];
}
