/**
 * Zod schemas for the subset of JSON Schema the resolver understands
 *
 * Annotations outside this subset (`description`, `$comment`, ...) are stripped.
 * Keywords that can declare fields the resolver cannot map (`not`, `if`/`then`,
 * `patternProperties`, ...) are kept as opaque values so the resolver can reject
 * them.
 */

import { z } from 'zod';

export interface SchemaNode {
  $id?: string;
  $ref?: string;
  title?: string;
  type?: string | string[];
  properties?: Record<string, SchemaNode>;
  required?: string[];
  items?: SchemaNode;
  allOf?: SchemaNode[];
  anyOf?: SchemaNode[];
  oneOf?: SchemaNode[];
  const?: unknown;
  enum?: unknown[];
  format?: string;
  not?: unknown;
  if?: unknown;
  then?: unknown;
  else?: unknown;
  dependentSchemas?: unknown;
  dependencies?: unknown;
  patternProperties?: unknown;
  additionalProperties?: unknown;
  unevaluatedProperties?: unknown;
  propertyNames?: unknown;
  prefixItems?: unknown;
  additionalItems?: unknown;
  unevaluatedItems?: unknown;
  contains?: unknown;
}

/** Keywords rejected whatever their value */
export const UNSUPPORTED_SCHEMA_KEYWORDS = [
  'not',
  'if',
  'then',
  'else',
  'dependentSchemas',
  'dependencies',
  'patternProperties',
  'propertyNames',
  'prefixItems',
  'contains',
] as const;

/** Keywords allowed as booleans, rejected when they hold a schema */
export const SCHEMA_VALUED_KEYWORDS = [
  'additionalProperties',
  'unevaluatedProperties',
  'additionalItems',
  'unevaluatedItems',
] as const;

export const schemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.object({
    $id: z.string().optional(),
    $ref: z.string().min(1).optional(),
    title: z.string().optional(),
    type: z.union([z.string(), z.array(z.string()).min(1)]).optional(),
    properties: z.record(schemaNodeSchema).optional(),
    required: z.array(z.string()).optional(),
    items: schemaNodeSchema.optional(),
    allOf: z.array(schemaNodeSchema).min(1).optional(),
    anyOf: z.array(schemaNodeSchema).min(1).optional(),
    oneOf: z.array(schemaNodeSchema).min(1).optional(),
    const: z.unknown().optional(),
    enum: z.array(z.unknown()).optional(),
    format: z.string().optional(),
    not: z.unknown().optional(),
    if: z.unknown().optional(),
    then: z.unknown().optional(),
    else: z.unknown().optional(),
    dependentSchemas: z.unknown().optional(),
    dependencies: z.unknown().optional(),
    patternProperties: z.unknown().optional(),
    additionalProperties: z.unknown().optional(),
    unevaluatedProperties: z.unknown().optional(),
    propertyNames: z.unknown().optional(),
    prefixItems: z.unknown().optional(),
    additionalItems: z.unknown().optional(),
    unevaluatedItems: z.unknown().optional(),
    contains: z.unknown().optional(),
  })
);

export const schemaDocumentSchema = z
  .object({
    $schema: z.string().optional(),
    $id: z.string().optional(),
    $defs: z.record(schemaNodeSchema).optional(),
    definitions: z.record(schemaNodeSchema).optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.$defs && !value.definitions) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected a "$defs" or "definitions" object',
        path: [],
      });
    }
  });

export type SchemaDocument = z.infer<typeof schemaDocumentSchema>;
