/**
 * V1 → V2 field translation
 *
 * Pure projection of a V1 field definition onto the V2 field schema.
 */

import type { V1FieldDefinition, V2FieldDefinition, V2FieldType } from '@fieldport/core';

/** V1 field types whose V2 name differs; anything else is passed through */
const TYPE_MAP: { [key: string]: V2FieldType } = {
  STRING: 'STRING',
  INTEGER: 'LONG',
  LONG: 'LONG_64',
  DOUBLE: 'DOUBLE',
  FLOAT: 'DOUBLE',
  DATE: 'DATE',
};

export function translateFieldType(fieldType: string): V2FieldType {
  const upper = fieldType.toUpperCase();
  return TYPE_MAP[upper] ?? upper;
}

/**
 * Translate a V1 field definition to the V2 schema.
 * `contentType`, `fieldOrigin`, `sourceId` and `metadataName` have no V2 field attribute.
 */
export function translateV1Field(field: V1FieldDefinition): V2FieldDefinition {
  return {
    name: field.name,
    type: translateFieldType(field.fieldType),
    description: '',
    facet: field.facet,
    multiValueFacet: field.multivalueFacet,
    sort: field.sort,
    includeInQuery: field.fieldQueries,
    includeInResults: field.displayField,
    mergeWithLexicon: field.freeTextQueries,
  };
}
