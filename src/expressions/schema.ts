import { z } from 'zod';
import { DATA_TYPE_NAMES, resolveDataTypeName } from '../engine/datatypes.js';
import { checkArity } from './logical.js';
import { patternProblem } from './patterns.js';
import type {
  ExpressionChain,
  ExpressionItem,
  LogicalKind,
  OpItem,
  StrOp,
} from './types.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const dataTypeSchema = z.string().transform((name, ctx) => {
  const resolved = resolveDataTypeName(name);
  if (resolved === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown datatype "${name}" (expected one of ${DATA_TYPE_NAMES.join(', ')})`,
    });
    return z.NEVER;
  }
  return resolved;
});

export const patternSchema = z.string().superRefine((pattern, ctx) => {
  const problem = patternProblem(pattern);
  if (problem !== undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid regular expression: ${problem}` });
  }
});

/**
 * A chain is either a bare column name or an expression object with an
 * optional `ops` list.
 */
export const chainSchema: Schema<ExpressionChain> = z.lazy(() =>
  z.union([
    z
      .string()
      .min(1)
      .transform((name): ExpressionChain => ({ base: { type: 'column', name }, ops: [] })),
    expressionDocumentSchema.transform(toChain),
  ]),
);

export const opSchema: Schema<OpItem> = z.lazy(() => opDocumentSchema);

export function logicalConditions<T>(kind: LogicalKind, item: Schema<T>) {
  return z.array(item).superRefine((conditions, ctx) => {
    const problem = checkArity(kind, conditions.length);
    if (problem !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });
}

const strOpSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('to_lowercase') }).strict(),
    z.object({ type: z.literal('to_uppercase') }).strict(),
    z.object({ type: z.literal('strip_chars'), characters: z.string().optional() }).strict(),
    z
      .object({
        type: z.literal('replace'),
        pattern: z.string(),
        value: z.string(),
        literal: z.boolean().default(false),
        all: z.boolean().default(false),
      })
      .strict(),
    z
      .object({ type: z.literal('slice'), offset: z.number().int(), length: z.number().int().nonnegative().optional() })
      .strict(),
    z.object({ type: z.literal('split'), by: z.string() }).strict(),
    z
      .object({
        type: z.literal('strptime'),
        dtype: z.enum(['Date', 'Datetime']),
        format: z.string(),
      })
      .strict(),
    z
      .object({ type: z.literal('extract'), pattern: patternSchema, group: z.number().int().nonnegative().default(1) })
      .strict(),
    z
      .object({
        type: z.literal('pad_start'),
        length: z.number().int().nonnegative(),
        fill_char: z.string().length(1).default(' '),
      })
      .strict(),
    z.object({ type: z.literal('json_path_match'), path: z.string() }).strict(),
  ])
  .transform(
    (doc): StrOp =>
      doc.type === 'pad_start' ? { type: 'pad_start', length: doc.length, fillChar: doc.fill_char } : doc,
  );

const listOpSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('get'), index: z.number().int() }).strict(),
  z.object({ type: z.literal('join'), separator: z.string() }).strict(),
  z.object({ type: z.literal('first') }).strict(),
  z.object({ type: z.literal('last') }).strict(),
  z.object({ type: z.literal('lengths') }).strict(),
  z.object({ type: z.literal('contains'), item: chainSchema }).strict(),
  z.object({ type: z.literal('unique') }).strict(),
  z.object({ type: z.literal('eval'), expr: chainSchema }).strict(),
]);

const structOpSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('field'), name: z.string() }).strict(),
  z.object({ type: z.literal('rename_fields'), names: z.array(z.string()) }).strict(),
]);

function otherOp<T extends string>(type: T) {
  return z.object({ type: z.literal(type), other: chainSchema }).strict();
}

const opDocumentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('alias'), name: z.string() }).strict(),
  z.object({ type: z.literal('cast'), dtype: dataTypeSchema, strict: z.boolean().default(true) }).strict(),
  z.object({ type: z.literal('extract_groups'), pattern: patternSchema }).strict(),
  z.object({ type: z.literal('drop_null') }).strict(),
  z.object({ type: z.literal('fill_null'), value: chainSchema }).strict(),
  z.object({ type: z.literal('contains'), pattern: z.string(), literal: z.boolean().default(false) }).strict(),
  z.object({ type: z.literal('is_null'), value: z.boolean().default(true) }).strict(),
  otherOp('eq'),
  otherOp('neq'),
  otherOp('gt'),
  otherOp('lt'),
  otherOp('gt_eq'),
  otherOp('lt_eq'),
  z.object({ type: z.literal('and'), conditions: z.array(chainSchema) }).strict(),
  z.object({ type: z.literal('or'), conditions: z.array(chainSchema) }).strict(),
  otherOp('add'),
  otherOp('sub'),
  otherOp('mul'),
  otherOp('div'),
  z.object({ type: z.literal('str'), op: strOpSchema }).strict(),
  z.object({ type: z.literal('list'), op: listOpSchema }).strict(),
  z.object({ type: z.literal('struct'), op: structOpSchema }).strict(),
]);

const ops = { ops: z.array(opSchema).default([]) };

const expressionDocumentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('column'), name: z.string().min(1), ...ops }).strict(),
  z.object({ type: z.literal('literal'), value: z.union([z.string(), z.number(), z.boolean()]), ...ops }).strict(),
  z.object({ type: z.literal('null'), ...ops }).strict(),
  z.object({ type: z.literal('len'), ...ops }).strict(),
  z.object({ type: z.literal('element'), ...ops }).strict(),
  z.object({ type: z.literal('match'), column: z.string(), pattern: patternSchema, ...ops }).strict(),
  z.object({ type: z.literal('and'), conditions: logicalConditions('and', chainSchema), ...ops }).strict(),
  z.object({ type: z.literal('or'), conditions: logicalConditions('or', chainSchema), ...ops }).strict(),
  z.object({ type: z.literal('not'), expr: chainSchema, ...ops }).strict(),
  z.object({ type: z.literal('as_struct'), fields: z.array(chainSchema).min(1), ...ops }).strict(),
  z
    .object({
      type: z.literal('int_range'),
      start: z.number().int().default(0),
      step: z.number().int().refine((step) => step !== 0, 'step must not be 0').default(1),
      dtype: dataTypeSchema.default('Int64'),
      ...ops,
    })
    .strict(),
  z
    .object({
      type: z.literal('concat_str'),
      columns: z.array(chainSchema).min(1),
      separator: z.string().default(''),
      ignore_nulls: z.boolean().default(false),
      ...ops,
    })
    .strict(),
  z
    .object({
      type: z.literal('condition'),
      when: chainSchema,
      then: chainSchema,
      otherwise: chainSchema,
      ...ops,
    })
    .strict(),
]);

type ExpressionDocument = z.output<typeof expressionDocumentSchema>;

function toExpressionItem(doc: ExpressionDocument): ExpressionItem {
  switch (doc.type) {
    case 'column':
      return { type: 'column', name: doc.name };
    case 'literal':
      return { type: 'literal', value: doc.value };
    case 'null':
    case 'len':
    case 'element':
      return { type: doc.type };
    case 'match':
      return { type: 'match', column: doc.column, pattern: doc.pattern };
    case 'and':
    case 'or':
      return { type: doc.type, conditions: doc.conditions };
    case 'not':
      return { type: 'not', expr: doc.expr };
    case 'as_struct':
      return { type: 'as_struct', fields: doc.fields };
    case 'int_range':
      return { type: 'int_range', start: doc.start, step: doc.step, dtype: doc.dtype };
    case 'concat_str':
      return {
        type: 'concat_str',
        columns: doc.columns,
        separator: doc.separator,
        ignoreNulls: doc.ignore_nulls,
      };
    case 'condition':
      return { type: 'condition', when: doc.when, then: doc.then, otherwise: doc.otherwise };
  }
}

function toChain(doc: ExpressionDocument): ExpressionChain {
  return { base: toExpressionItem(doc), ops: doc.ops };
}
