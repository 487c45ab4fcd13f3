import type { DataTypeName } from '../engine/datatypes.js';

export type LiteralValue = string | number | boolean;

export type LogicalKind = 'and' | 'or';

/**
 * Leaf and composite expression nodes. Each evaluates to one engine column
 * expression; children are owned sub-trees.
 */
export type ExpressionItem =
  | { readonly type: 'column'; readonly name: string }
  | { readonly type: 'literal'; readonly value: LiteralValue }
  | { readonly type: 'null' }
  | { readonly type: 'len' }
  | { readonly type: 'element' }
  | { readonly type: 'match'; readonly column: string; readonly pattern: string }
  | { readonly type: LogicalKind; readonly conditions: readonly ExpressionChain[] }
  | { readonly type: 'not'; readonly expr: ExpressionChain }
  | { readonly type: 'as_struct'; readonly fields: readonly ExpressionChain[] }
  | {
      readonly type: 'int_range';
      readonly start: number;
      readonly step: number;
      readonly dtype: DataTypeName;
    }
  | {
      readonly type: 'concat_str';
      readonly columns: readonly ExpressionChain[];
      readonly separator: string;
      readonly ignoreNulls: boolean;
    }
  | {
      readonly type: 'condition';
      readonly when: ExpressionChain;
      readonly then: ExpressionChain;
      readonly otherwise: ExpressionChain;
    };

/** A base expression followed by operations applied strictly in list order. */
export interface ExpressionChain {
  readonly base: ExpressionItem;
  readonly ops: readonly OpItem[];
}

export type ComparisonKind = 'eq' | 'neq' | 'gt' | 'lt' | 'gt_eq' | 'lt_eq';

export type ArithmeticKind = 'add' | 'sub' | 'mul' | 'div';

/** Unary transformations that consume the expression produced so far. */
export type OpItem =
  | { readonly type: 'alias'; readonly name: string }
  | { readonly type: 'cast'; readonly dtype: DataTypeName; readonly strict: boolean }
  | { readonly type: 'extract_groups'; readonly pattern: string }
  | { readonly type: 'drop_null' }
  | { readonly type: 'fill_null'; readonly value: ExpressionChain }
  | { readonly type: 'contains'; readonly pattern: string; readonly literal: boolean }
  | { readonly type: 'is_null'; readonly value: boolean }
  | { readonly type: ComparisonKind; readonly other: ExpressionChain }
  // Unlike the top-level combinator, these fold any number of chains.
  | { readonly type: LogicalKind; readonly conditions: readonly ExpressionChain[] }
  | { readonly type: ArithmeticKind; readonly other: ExpressionChain }
  | { readonly type: 'str'; readonly op: StrOp }
  | { readonly type: 'list'; readonly op: ListOp }
  | { readonly type: 'struct'; readonly op: StructOp };

export type StrOp =
  | { readonly type: 'to_lowercase' }
  | { readonly type: 'to_uppercase' }
  | { readonly type: 'strip_chars'; readonly characters?: string }
  | {
      readonly type: 'replace';
      readonly pattern: string;
      readonly value: string;
      readonly literal: boolean;
      readonly all: boolean;
    }
  | { readonly type: 'slice'; readonly offset: number; readonly length?: number }
  | { readonly type: 'split'; readonly by: string }
  | {
      readonly type: 'strptime';
      readonly dtype: 'Date' | 'Datetime';
      readonly format: string;
    }
  | { readonly type: 'extract'; readonly pattern: string; readonly group: number }
  | { readonly type: 'pad_start'; readonly length: number; readonly fillChar: string }
  | { readonly type: 'json_path_match'; readonly path: string };

export type ListOp =
  | { readonly type: 'get'; readonly index: number }
  | { readonly type: 'join'; readonly separator: string }
  | { readonly type: 'first' }
  | { readonly type: 'last' }
  | { readonly type: 'lengths' }
  | { readonly type: 'contains'; readonly item: ExpressionChain }
  | { readonly type: 'unique' }
  | { readonly type: 'eval'; readonly expr: ExpressionChain };

export type StructOp =
  | { readonly type: 'field'; readonly name: string }
  | { readonly type: 'rename_fields'; readonly names: readonly string[] };
