import pl from 'nodejs-polars';
import { toEngineDataType } from '../engine/datatypes.js';
import { foldLogical } from './logical.js';
import { applyOp } from './ops.js';
import { assertPattern } from './patterns.js';
import type { ExpressionChain, ExpressionItem } from './types.js';

/**
 * Compiles one expression node into an engine expression. Pure: nothing is
 * read or materialized here.
 */
export function evaluateExpression(item: ExpressionItem): pl.Expr {
  switch (item.type) {
    case 'column':
      return pl.col(item.name);
    case 'literal':
      return pl.lit(item.value);
    case 'null':
      return pl.lit(null);
    case 'len':
      return pl.len();
    case 'element':
      return pl.element();
    case 'match':
      return pl.col(item.column).str.contains(assertPattern(item.pattern));
    case 'and':
      return foldLogical('and', item.conditions.map(evaluateChain), (acc, next) => acc.and(next));
    case 'or':
      return foldLogical('or', item.conditions.map(evaluateChain), (acc, next) => acc.or(next));
    case 'not':
      return evaluateChain(item.expr).not();
    case 'as_struct':
      return pl.struct(item.fields.map(evaluateChain));
    case 'int_range': {
      // one value per row: start, start + step, ...
      const end = pl.len().multiplyBy(item.step).plus(item.start);
      return pl.intRange(pl.lit(item.start), end, item.step, toEngineDataType(item.dtype), false);
    }
    case 'concat_str':
      return pl.concatString(item.columns.map(evaluateChain), item.separator, item.ignoreNulls);
    case 'condition':
      return pl
        .when(evaluateChain(item.when))
        .then(evaluateChain(item.then))
        .otherwise(evaluateChain(item.otherwise));
  }
}

/** `ops.reduce(apply, evaluate(base))` */
export function evaluateChain(chain: ExpressionChain): pl.Expr {
  return chain.ops.reduce((acc, op) => applyOp(op, acc), evaluateExpression(chain.base));
}
