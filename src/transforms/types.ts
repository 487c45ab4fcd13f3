import type { Condition } from '../conditions/conditions.js';
import type { ExpressionChain } from '../expressions/types.js';
import type { Loader } from '../types.js';

export type JoinHow = 'inner' | 'left' | 'right' | 'full' | 'anti';

export type ConcatHow = 'vertical' | 'horizontal' | 'diagonal';

export type DuplicateKeep = 'first' | 'last' | 'any' | 'none';

export interface SortKey {
  readonly column: string;
  readonly descending: boolean;
}

export type RenameTransform =
  | { readonly type: 'rename'; readonly map: Readonly<Record<string, string>> }
  | { readonly type: 'rename'; readonly prefix: string };

/** A step that takes a lazy plan and returns a new one. */
export type TransformItem =
  | { readonly type: 'select'; readonly columns: readonly ExpressionChain[] }
  | { readonly type: 'drop'; readonly columns: readonly string[] }
  | RenameTransform
  | {
      readonly type: 'filter';
      readonly conditions: readonly ExpressionChain[];
      readonly condition?: Condition;
    }
  | { readonly type: 'extract'; readonly column: string; readonly pattern: string; readonly filter: boolean }
  | { readonly type: 'unnest'; readonly columns: readonly string[] }
  | { readonly type: 'sort_by'; readonly by: readonly SortKey[] }
  | { readonly type: 'drop_duplicates'; readonly subset?: readonly string[]; readonly keep: DuplicateKeep }
  | {
      readonly type: 'join';
      readonly right: Loader;
      readonly leftOn: readonly ExpressionChain[];
      readonly rightOn: readonly ExpressionChain[];
      readonly how: JoinHow;
    }
  | { readonly type: 'set'; readonly expr: ExpressionChain }
  | { readonly type: 'with_columns'; readonly columns: readonly ExpressionChain[] }
  | { readonly type: 'explode'; readonly columns: readonly string[] }
  | { readonly type: 'collect' }
  | { readonly type: 'group_by'; readonly keys: readonly ExpressionChain[]; readonly aggregations: readonly ExpressionChain[] }
  | { readonly type: 'concat'; readonly other: Loader; readonly how: ConcatHow };

export type TransformType = TransformItem['type'];
