import { z } from 'zod';
import { canonicalPath, expandPaths } from './paths.js';
import { dataTypeSchema } from '../expressions/schema.js';
import type { ResolveContext } from '../context.js';
import type { SourceItem } from './types.js';

const pathList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const schemaField = { schema: z.record(z.string(), dataTypeSchema).optional() };

const separatorSchema = z
  .string()
  .length(1)
  .refine((sep) => sep.charCodeAt(0) < 128, 'separator must be a single ASCII character');

/*
 * Source shapes as they appear in documents. A loader flattens these into its
 * own object next to `transforms`, so they are exported as raw shapes.
 */
export const csvSourceShape = {
  type: z.literal('csv'),
  path: pathList,
  separator: separatorSchema.optional(),
  has_header: z.boolean().default(true),
  ...schemaField,
};

export const jsonLineSourceShape = { type: z.literal('json_line'), path: pathList, ...schemaField };

export const jsonSourceShape = { type: z.literal('json'), path: z.string().min(1), ...schemaField };

export const parquetSourceShape = { type: z.literal('parquet'), path: pathList, ...schemaField };

export const inlineSourceShape = {
  type: z.literal('inline'),
  columns: z
    .array(
      z
        .object({
          name: z.string().min(1),
          datatype: dataTypeSchema.optional(),
          values: z.array(z.union([z.string(), z.number(), z.boolean()])),
        })
        .strict(),
    )
    .min(1)
    .superRefine((columns, ctx) => {
      const [first, ...rest] = columns;
      if (first !== undefined && rest.some((column) => column.values.length !== first.values.length)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'inline columns must all have the same length' });
      }
    }),
};

export const configSourceShape = { type: z.literal('config'), path: z.string().min(1) };

export const sourceDocumentSchema = z.discriminatedUnion('type', [
  z.object(csvSourceShape).strict(),
  z.object(jsonLineSourceShape).strict(),
  z.object(jsonSourceShape).strict(),
  z.object(parquetSourceShape).strict(),
  z.object(inlineSourceShape).strict(),
  z.object(configSourceShape).strict(),
]);

export type SourceDocument = z.output<typeof sourceDocumentSchema>;

/**
 * Maps a validated source document to its AST node, resolving every path
 * against the context's base directory. Throws PathError for missing files.
 */
export function toSourceItem(doc: SourceDocument, ctx: ResolveContext): SourceItem {
  const base = ctx.baseDirectory;
  switch (doc.type) {
    case 'csv':
      return {
        type: 'csv',
        paths: expandPaths(doc.path, base),
        hasHeader: doc.has_header,
        ...(doc.separator !== undefined && { separator: doc.separator }),
        ...(doc.schema !== undefined && { schema: doc.schema }),
      };
    case 'json_line':
    case 'parquet':
      return {
        type: doc.type,
        paths: expandPaths(doc.path, base),
        ...(doc.schema !== undefined && { schema: doc.schema }),
      };
    case 'json':
      return {
        type: 'json',
        path: canonicalPath(doc.path, base),
        ...(doc.schema !== undefined && { schema: doc.schema }),
      };
    case 'inline':
      return {
        type: 'inline',
        columns: doc.columns.map((column) => ({
          name: column.name,
          values: column.values,
          ...(column.datatype !== undefined && { datatype: column.datatype }),
        })),
      };
    case 'config':
      return { type: 'config', path: canonicalPath(doc.path, base) };
  }
}
