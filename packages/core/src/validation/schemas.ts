/**
 * Zod schemas for payloads entering the core from either organization
 */

import { z } from 'zod';
import type {
  V1FieldDefinition,
  V2FieldDefinition,
  DataSource,
  V1SourceList,
  MappingRule,
  V2SourceMappings,
} from '../types/index.js';

/** Origin of the fields the migration copies */
export const USER_FIELD_ORIGIN = 'CUSTOM';

/** A blank source id means the field is not tied to a source */
const v1SourceIdSchema = z.preprocess(
  (value) => (value === undefined || value === '' ? null : value),
  z.string().nullable()
);

/** V1 user field; unknown attributes are dropped */
export const v1FieldSchema: z.ZodType<V1FieldDefinition, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  fieldType: z.string().min(1),
  contentType: z.string(),
  fieldQueries: z.boolean(),
  freeTextQueries: z.boolean(),
  facet: z.boolean(),
  multivalueFacet: z.boolean(),
  sort: z.boolean(),
  displayField: z.boolean(),
  fieldOrigin: z.string().min(1),
  sourceId: v1SourceIdSchema,
  metadataName: z.string().min(1),
});

/**
 * Non-user V1 field. These are never copied, so irregular values fall back
 * to blanks instead of failing the whole listing.
 */
const v1OtherFieldSchema: z.ZodType<V1FieldDefinition, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  fieldType: z.string().catch(''),
  contentType: z.string().catch(''),
  fieldQueries: z.boolean().catch(false),
  freeTextQueries: z.boolean().catch(false),
  facet: z.boolean().catch(false),
  multivalueFacet: z.boolean().catch(false),
  sort: z.boolean().catch(false),
  displayField: z.boolean().catch(false),
  fieldOrigin: z.string(),
  sourceId: v1SourceIdSchema.catch(null),
  metadataName: z.string().catch(''),
});

/**
 * One entry of a V1 field listing. Only `name` and `fieldOrigin` are read
 * before deciding how strictly to validate the rest.
 */
export const v1FieldEntrySchema: z.ZodType<V1FieldDefinition, z.ZodTypeDef, unknown> = z
  .object({ name: z.string(), fieldOrigin: z.string() })
  .passthrough()
  .transform((entry, ctx) => {
    const schema = entry.fieldOrigin === USER_FIELD_ORIGIN ? v1FieldSchema : v1OtherFieldSchema;
    const result = schema.safeParse(entry);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue(issue);
      }
      return z.NEVER;
    }
    return result.data;
  });

export const v1FieldListSchema = z.array(v1FieldEntrySchema);

export const dataSourceSchema: z.ZodType<DataSource, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: z.string(),
});

export const v1SourceListSchema: z.ZodType<V1SourceList, z.ZodTypeDef, unknown> = z.object({
  sources: z.array(dataSourceSchema),
});

export const v2SourceListSchema = z.array(dataSourceSchema);

export const v2FieldSchema: z.ZodType<V2FieldDefinition, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  description: z.string().default(''),
  facet: z.boolean().default(false),
  multiValueFacet: z.boolean().default(false),
  sort: z.boolean().default(false),
  includeInQuery: z.boolean().default(false),
  includeInResults: z.boolean().default(false),
  mergeWithLexicon: z.boolean().default(false),
});

/** One page of `/indexes/page/fields` */
export const v2FieldPageSchema = z.object({
  items: z.array(v2FieldSchema),
  totalPages: z.number().int().min(0),
  totalEntries: z.number().int().min(0).optional(),
});

export const mappingRuleSchema: z.ZodType<MappingRule, z.ZodTypeDef, unknown> = z.object({
  field: z.string().min(1),
  content: z.array(z.string()),
});

export const v2SourceMappingsSchema: z.ZodType<V2SourceMappings, z.ZodTypeDef, unknown> = z.object({
  common: z.object({
    rules: z.array(mappingRuleSchema).default([]),
  }),
});

/**
 * Render zod issues as one `- path: message` line each
 */
export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
