import type { DataTypeName } from '../engine/datatypes.js';
import type {
  ArithmeticKind,
  ComparisonKind,
  ExpressionChain,
  ExpressionItem,
  ListOp,
  LiteralValue,
  OpItem,
  StrOp,
  StructOp,
} from '../expressions/types.js';

/** A chain, or a plain value used as a literal. */
export type Operand = ExpressionChain | LiteralValue;

export function toChain(operand: Operand): ExpressionChain {
  if (typeof operand === 'object') return operand;
  return { base: { type: 'literal', value: operand }, ops: [] };
}

/**
 * Fluent immutable builder for expression chains. Implements ExpressionChain
 * so it can be used anywhere the AST takes one. Every method returns a new
 * ChainBuilder with one more operation.
 */
export class ChainBuilder implements ExpressionChain {
  constructor(
    readonly base: ExpressionItem,
    readonly ops: readonly OpItem[] = [],
  ) {}

  /** Append a raw operation. */
  pipe(op: OpItem): ChainBuilder {
    return new ChainBuilder(this.base, [...this.ops, op]);
  }

  get str(): StrOps {
    return new StrOps(this);
  }

  get list(): ListOps {
    return new ListOps(this);
  }

  get struct(): StructOps {
    return new StructOps(this);
  }

  alias(name: string): ChainBuilder {
    return this.pipe({ type: 'alias', name });
  }

  cast(dtype: DataTypeName, strict = true): ChainBuilder {
    return this.pipe({ type: 'cast', dtype, strict });
  }

  extractGroups(pattern: string): ChainBuilder {
    return this.pipe({ type: 'extract_groups', pattern });
  }

  dropNull(): ChainBuilder {
    return this.pipe({ type: 'drop_null' });
  }

  fillNull(value: Operand): ChainBuilder {
    return this.pipe({ type: 'fill_null', value: toChain(value) });
  }

  contains(pattern: string, literal = false): ChainBuilder {
    return this.pipe({ type: 'contains', pattern, literal });
  }

  isNull(): ChainBuilder {
    return this.pipe({ type: 'is_null', value: true });
  }

  isNotNull(): ChainBuilder {
    return this.pipe({ type: 'is_null', value: false });
  }

  private compare(type: ComparisonKind, other: Operand): ChainBuilder {
    return this.pipe({ type, other: toChain(other) });
  }

  private arithmetic(type: ArithmeticKind, other: Operand): ChainBuilder {
    return this.pipe({ type, other: toChain(other) });
  }

  eq(other: Operand): ChainBuilder {
    return this.compare('eq', other);
  }

  neq(other: Operand): ChainBuilder {
    return this.compare('neq', other);
  }

  gt(other: Operand): ChainBuilder {
    return this.compare('gt', other);
  }

  lt(other: Operand): ChainBuilder {
    return this.compare('lt', other);
  }

  gtEq(other: Operand): ChainBuilder {
    return this.compare('gt_eq', other);
  }

  ltEq(other: Operand): ChainBuilder {
    return this.compare('lt_eq', other);
  }

  /** AND this value with each of the others, in order. */
  and(...others: ExpressionChain[]): ChainBuilder {
    return this.pipe({ type: 'and', conditions: others });
  }

  or(...others: ExpressionChain[]): ChainBuilder {
    return this.pipe({ type: 'or', conditions: others });
  }

  add(other: Operand): ChainBuilder {
    return this.arithmetic('add', other);
  }

  sub(other: Operand): ChainBuilder {
    return this.arithmetic('sub', other);
  }

  mul(other: Operand): ChainBuilder {
    return this.arithmetic('mul', other);
  }

  div(other: Operand): ChainBuilder {
    return this.arithmetic('div', other);
  }
}

/**
 * Intermediate step for string operations. Each method closes the step and
 * returns the extended chain.
 */
export class StrOps {
  constructor(private readonly _chain: ChainBuilder) {}

  private op(op: StrOp): ChainBuilder {
    return this._chain.pipe({ type: 'str', op });
  }

  toLowercase(): ChainBuilder {
    return this.op({ type: 'to_lowercase' });
  }

  toUppercase(): ChainBuilder {
    return this.op({ type: 'to_uppercase' });
  }

  /** Strips whitespace, or the given characters, from both ends. */
  stripChars(characters?: string): ChainBuilder {
    return this.op(characters === undefined ? { type: 'strip_chars' } : { type: 'strip_chars', characters });
  }

  replace(pattern: string, value: string, options: { literal?: boolean; all?: boolean } = {}): ChainBuilder {
    return this.op({ type: 'replace', pattern, value, literal: options.literal ?? false, all: options.all ?? false });
  }

  slice(offset: number, length?: number): ChainBuilder {
    return this.op(length === undefined ? { type: 'slice', offset } : { type: 'slice', offset, length });
  }

  split(by: string): ChainBuilder {
    return this.op({ type: 'split', by });
  }

  strptime(dtype: 'Date' | 'Datetime', format: string): ChainBuilder {
    return this.op({ type: 'strptime', dtype, format });
  }

  extract(pattern: string, group = 1): ChainBuilder {
    return this.op({ type: 'extract', pattern, group });
  }

  padStart(length: number, fillChar = ' '): ChainBuilder {
    return this.op({ type: 'pad_start', length, fillChar });
  }

  jsonPathMatch(path: string): ChainBuilder {
    return this.op({ type: 'json_path_match', path });
  }
}

export class ListOps {
  constructor(private readonly _chain: ChainBuilder) {}

  private op(op: ListOp): ChainBuilder {
    return this._chain.pipe({ type: 'list', op });
  }

  get(index: number): ChainBuilder {
    return this.op({ type: 'get', index });
  }

  join(separator: string): ChainBuilder {
    return this.op({ type: 'join', separator });
  }

  first(): ChainBuilder {
    return this.op({ type: 'first' });
  }

  last(): ChainBuilder {
    return this.op({ type: 'last' });
  }

  lengths(): ChainBuilder {
    return this.op({ type: 'lengths' });
  }

  contains(item: Operand): ChainBuilder {
    return this.op({ type: 'contains', item: toChain(item) });
  }

  unique(): ChainBuilder {
    return this.op({ type: 'unique' });
  }

  /** Runs `expr` against every element; use `expr.element()` inside it. */
  eval(expr: ExpressionChain): ChainBuilder {
    return this.op({ type: 'eval', expr });
  }
}

export class StructOps {
  constructor(private readonly _chain: ChainBuilder) {}

  private op(op: StructOp): ChainBuilder {
    return this._chain.pipe({ type: 'struct', op });
  }

  field(name: string): ChainBuilder {
    return this.op({ type: 'field', name });
  }

  renameFields(...names: string[]): ChainBuilder {
    return this.op({ type: 'rename_fields', names });
  }
}
