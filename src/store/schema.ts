import { z } from 'zod';
import type { FieldSchema } from '../types.js';

/**
 * Content file schemas
 *
 * Content files are YAML. They mirror the store entities with a few
 * conveniences for hand-written files:
 *
 * - versions may be integers or ISO timestamps (stored as epoch millis)
 * - atom content and slot meta may be written as YAML structures; they are
 *   stored as JSON text
 * - a type schema may be written inline or as a JSON string
 * - association records nest under their parent (`articles[].atoms`,
 *   `collections[].articles`, `menus[].articles`)
 */

const IdSchema = z.number().int().nonnegative();

export const VersionSchema = z
  .union([z.number().int().nonnegative(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'number') {
      return value;
    }
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid version timestamp: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

const JsonTextSchema = z
  .unknown()
  .transform(value => (typeof value === 'string' ? value : JSON.stringify(value ?? null)));

export const FieldSchemaSchema: z.ZodType<FieldSchema> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    description: z.string().optional(),
    properties: z.record(FieldSchemaSchema).optional(),
    items: FieldSchemaSchema.optional(),
    markdown: z.boolean().optional(),
  })
);

function decodeSchemaText(value: unknown): unknown {
  if (value === undefined || value === null || value === '') {
    return {};
  }
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export const TypeFileSchema = z.object({
  id: IdSchema,
  name: z.string().min(1),
  schema: z.preprocess(decodeSchemaText, FieldSchemaSchema),
  template: z.string().default('[root]'),
  version: VersionSchema.default(0),
});

export const AtomFileSchema = z.object({
  id: IdSchema,
  key: z.string().min(1).nullable().default(null),
  type: IdSchema,
  content: JsonTextSchema,
  version: VersionSchema.default(0),
});

export const ArticleFileSchema = z.object({
  id: IdSchema,
  name: z.string(),
  client: IdSchema,
  version: VersionSchema.default(0),
  atoms: z
    .array(
      z.object({
        atom: IdSchema,
        sortorder: z.number().int(),
      })
    )
    .default([]),
});

export const CollectionFileSchema = z.object({
  id: IdSchema,
  name: z.string(),
  client: IdSchema,
  articles: z
    .array(
      z.object({
        article: IdSchema,
        sortorder: z.number().int(),
        url: z.string().nullable().default(null),
        template: z.string().default(''),
        meta: z
          .unknown()
          .transform(value => (value === undefined || value === null ? '' : typeof value === 'string' ? value : JSON.stringify(value))),
      })
    )
    .default([]),
});

export const MenuFileSchema = z.object({
  id: IdSchema,
  name: z.string(),
  client: IdSchema,
  collection: IdSchema,
  articles: z
    .array(
      z.object({
        article: IdSchema,
        sortorder: z.number().int(),
        name: z.string().nullable().default(null),
      })
    )
    .default([]),
});

export const VariableFileSchema = z.object({
  client: IdSchema,
  tag: z.string().regex(/^[A-Za-z_][\w.:-]*$/, 'Tag must start with a letter or underscore'),
  value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  version: VersionSchema.default(0),
});

export const ContentFileSchema = z.object({
  imports: z.array(z.string()).default([]),
  types: z.array(TypeFileSchema).default([]),
  atoms: z.array(AtomFileSchema).default([]),
  articles: z.array(ArticleFileSchema).default([]),
  collections: z.array(CollectionFileSchema).default([]),
  menus: z.array(MenuFileSchema).default([]),
  variables: z.array(VariableFileSchema).default([]),
});

export type ContentFile = z.infer<typeof ContentFileSchema>;
