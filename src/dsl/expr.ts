import { logicalNode } from '../expressions/logical.js';
import { ChainBuilder, toChain, type Operand } from './builder.js';
import type { DataTypeName } from '../engine/datatypes.js';
import type { ExpressionChain, LiteralValue } from '../expressions/types.js';

/** `when(...)` awaiting its value. */
export class WhenStage {
  constructor(private readonly _when: ExpressionChain) {}

  then(value: Operand): ThenStage {
    return new ThenStage(this._when, toChain(value));
  }
}

/** `when(...).then(...)` awaiting the fallback value. */
export class ThenStage {
  constructor(
    private readonly _when: ExpressionChain,
    private readonly _then: ExpressionChain,
  ) {}

  otherwise(value: Operand): ChainBuilder {
    return new ChainBuilder({ type: 'condition', when: this._when, then: this._then, otherwise: toChain(value) });
  }
}

/**
 * Entry point for the expression DSL.
 *
 * @example
 * expr.col('price').mul(expr.col('quantity')).alias('total')
 *
 * expr.when(expr.col('country').eq('NL')).then('domestic').otherwise('abroad').alias('market')
 */
export const expr = {
  col(name: string): ChainBuilder {
    return new ChainBuilder({ type: 'column', name });
  },
  lit(value: LiteralValue): ChainBuilder {
    return new ChainBuilder({ type: 'literal', value });
  },
  null(): ChainBuilder {
    return new ChainBuilder({ type: 'null' });
  },
  len(): ChainBuilder {
    return new ChainBuilder({ type: 'len' });
  },
  /** The current element inside `list.eval`. */
  element(): ChainBuilder {
    return new ChainBuilder({ type: 'element' });
  },
  match(column: string, pattern: string): ChainBuilder {
    return new ChainBuilder({ type: 'match', column, pattern });
  },
  /** Throws ArityError with fewer than two conditions. */
  and(...conditions: ExpressionChain[]): ChainBuilder {
    return new ChainBuilder(logicalNode('and', conditions));
  },
  or(...conditions: ExpressionChain[]): ChainBuilder {
    return new ChainBuilder(logicalNode('or', conditions));
  },
  not(value: ExpressionChain): ChainBuilder {
    return new ChainBuilder({ type: 'not', expr: value });
  },
  struct(...fields: ExpressionChain[]): ChainBuilder {
    return new ChainBuilder({ type: 'as_struct', fields });
  },
  intRange(options: { start?: number; step?: number; dtype?: DataTypeName } = {}): ChainBuilder {
    return new ChainBuilder({
      type: 'int_range',
      start: options.start ?? 0,
      step: options.step ?? 1,
      dtype: options.dtype ?? 'Int64',
    });
  },
  concatStr(columns: ExpressionChain[], options: { separator?: string; ignoreNulls?: boolean } = {}): ChainBuilder {
    return new ChainBuilder({
      type: 'concat_str',
      columns,
      separator: options.separator ?? '',
      ignoreNulls: options.ignoreNulls ?? false,
    });
  },
  when(condition: ExpressionChain): WhenStage {
    return new WhenStage(condition);
  },
};
