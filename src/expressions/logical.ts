import { ArityError } from '../errors.js';
import type { LogicalKind } from './types.js';

export const MIN_LOGICAL_OPERANDS = 2;

/**
 * Returns the arity violation for an AND/OR operand list, or undefined when
 * the list is valid. Shared by the document schemas and `logicalNode`.
 */
export function checkArity(kind: LogicalKind, count: number): string | undefined {
  if (count < MIN_LOGICAL_OPERANDS) {
    return `${kind} statement must have at least ${MIN_LOGICAL_OPERANDS} conditions`;
  }
  return undefined;
}

/**
 * One-shot validating constructor for AND/OR nodes. Operand lists arrive
 * complete and are checked exactly once; a node built here always folds.
 */
export function logicalNode<K extends LogicalKind, T>(
  kind: K,
  conditions: readonly T[],
): { readonly type: K; readonly conditions: readonly T[] } {
  if (checkArity(kind, conditions.length) !== undefined) {
    throw new ArityError(kind, conditions.length);
  }
  return { type: kind, conditions: [...conditions] };
}

/**
 * Left fold over operands: the first seeds the accumulator and each following
 * operand is combined with it in input order.
 */
export function foldLogical<T>(
  kind: LogicalKind,
  operands: readonly T[],
  combine: (acc: T, next: T) => T,
): T {
  const [first, ...rest] = operands;
  if (first === undefined || rest.length === 0) {
    throw new ArityError(kind, operands.length);
  }
  return rest.reduce(combine, first);
}
