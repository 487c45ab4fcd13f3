import pl from 'nodejs-polars';
import { z } from 'zod';
import { foldLogical, logicalNode } from '../expressions/logical.js';
import { assertPattern } from '../expressions/patterns.js';
import { logicalConditions, patternSchema } from '../expressions/schema.js';
import type { LogicalKind } from '../expressions/types.js';

/**
 * Free-standing predicate tree. A smaller sibling of the expression AST used
 * where only row filters make sense.
 */
export type Condition =
  | { readonly type: 'match'; readonly column: string; readonly pattern: string }
  | { readonly type: LogicalKind; readonly conditions: readonly Condition[] };

export const conditionSchema: z.ZodType<Condition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('match'), column: z.string(), pattern: patternSchema }).strict(),
    z.object({ type: z.literal('and'), conditions: logicalConditions('and', conditionSchema) }).strict(),
    z.object({ type: z.literal('or'), conditions: logicalConditions('or', conditionSchema) }).strict(),
  ]),
);

export const condition = {
  match(column: string, pattern: string): Condition {
    return { type: 'match', column, pattern };
  },
  and(...conditions: Condition[]): Condition {
    return logicalNode('and', conditions);
  },
  or(...conditions: Condition[]): Condition {
    return logicalNode('or', conditions);
  },
};

export function evaluateCondition(cond: Condition): pl.Expr {
  switch (cond.type) {
    case 'match':
      return pl.col(cond.column).str.contains(assertPattern(cond.pattern));
    case 'and':
      return foldLogical('and', cond.conditions.map(evaluateCondition), (acc, next) => acc.and(next));
    case 'or':
      return foldLogical('or', cond.conditions.map(evaluateCondition), (acc, next) => acc.or(next));
  }
}
