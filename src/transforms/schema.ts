import { z } from 'zod';
import { conditionSchema } from '../conditions/conditions.js';
import { chainSchema, patternSchema } from '../expressions/schema.js';
import type { Loader } from '../types.js';
import type { TransformItem } from './types.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const nameList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const chainList = z.union([chainSchema, z.array(chainSchema).min(1)]);

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Builds the transform schema around the loader schema, which it needs for
 * the right-hand side of `join` and `concat`.
 */
export function createTransformSchema(loaderSchema: Schema<Loader>): Schema<TransformItem> {
  return z
    .discriminatedUnion('type', [
      z.object({ type: z.literal('select'), columns: z.array(chainSchema).min(1) }).strict(),
      z.object({ type: z.literal('drop'), columns: nameList }).strict(),
      z
        .object({
          type: z.literal('rename'),
          map: z.record(z.string(), z.string().min(1)).optional(),
          prefix: z.string().min(1).optional(),
        })
        .strict(),
      z
        .object({
          type: z.literal('filter'),
          conditions: z.array(chainSchema).default([]),
          condition: conditionSchema.optional(),
        })
        .strict(),
      z
        .object({
          type: z.literal('extract'),
          column: z.string().min(1),
          pattern: patternSchema,
          filter: z.boolean().default(false),
        })
        .strict(),
      z.object({ type: z.literal('unnest'), columns: nameList }).strict(),
      z
        .object({
          type: z.literal('sort_by'),
          by: z
            .array(z.object({ column: z.string().min(1), descending: z.boolean().default(false) }).strict())
            .min(1),
        })
        .strict(),
      z
        .object({
          type: z.literal('drop_duplicates'),
          subset: z.array(z.string().min(1)).min(1).optional(),
          keep: z.enum(['first', 'last', 'any', 'none']).default('any'),
        })
        .strict(),
      z
        .object({
          type: z.literal('join'),
          right: loaderSchema,
          left_on: chainList,
          right_on: chainList,
          how: z.enum(['inner', 'left', 'right', 'full', 'anti']).default('inner'),
        })
        .strict(),
      z.object({ type: z.literal('set'), expr: chainSchema }).strict(),
      z.object({ type: z.literal('with_columns'), columns: z.array(chainSchema).min(1) }).strict(),
      z.object({ type: z.literal('explode'), columns: nameList }).strict(),
      z.object({ type: z.literal('collect') }).strict(),
      z
        .object({
          type: z.literal('group_by'),
          keys: z.array(chainSchema).min(1),
          aggregations: z.array(chainSchema).default([]),
        })
        .strict(),
      z
        .object({
          type: z.literal('concat'),
          other: loaderSchema,
          how: z.enum(['vertical', 'horizontal', 'diagonal']).default('vertical'),
        })
        .strict(),
    ])
    .transform((doc, ctx): TransformItem => {
      switch (doc.type) {
        case 'drop':
        case 'unnest':
        case 'explode':
          return { type: doc.type, columns: toList(doc.columns) };
        case 'rename':
          if (doc.map !== undefined && doc.prefix === undefined) {
            return { type: 'rename', map: doc.map };
          }
          if (doc.prefix !== undefined && doc.map === undefined) {
            return { type: 'rename', prefix: doc.prefix };
          }
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rename takes exactly one of `map` or `prefix`' });
          return z.NEVER;
        case 'filter':
          if (doc.conditions.length === 0 && doc.condition === undefined) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: 'filter must have at least one of `conditions` or `condition`',
            });
            return z.NEVER;
          }
          return {
            type: 'filter',
            conditions: doc.conditions,
            ...(doc.condition !== undefined && { condition: doc.condition }),
          };
        case 'drop_duplicates':
          return {
            type: 'drop_duplicates',
            keep: doc.keep,
            ...(doc.subset !== undefined && { subset: doc.subset }),
          };
        case 'join': {
          const leftOn = toList(doc.left_on);
          const rightOn = toList(doc.right_on);
          if (leftOn.length !== rightOn.length) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `join needs as many right_on keys as left_on keys (${leftOn.length} != ${rightOn.length})`,
            });
            return z.NEVER;
          }
          return { type: 'join', right: doc.right, leftOn, rightOn, how: doc.how };
        }
        default:
          return doc;
      }
    });
}
