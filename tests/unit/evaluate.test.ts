import { describe, it, expect } from 'vitest';
import pl from 'nodejs-polars';
import { ArityError, EtlError, InvalidPatternError } from '../../src/errors.js';
import { evaluateChain, evaluateExpression } from '../../src/expressions/evaluate.js';
import type { ExpressionChain, ExpressionItem, OpItem } from '../../src/expressions/types.js';

function chain(base: ExpressionItem, ...ops: OpItem[]): ExpressionChain {
  return { base, ops };
}

const col = (name: string): ExpressionChain => chain({ type: 'column', name });
const lit = (value: string | number | boolean): ExpressionChain => chain({ type: 'literal', value });
const match = (column: string, pattern: string): ExpressionChain => chain({ type: 'match', column, pattern });

function run(expression: ExpressionChain, data: Record<string, unknown[]>): unknown[] {
  return pl.DataFrame(data).select(evaluateChain(expression).alias('out')).getColumn('out').toArray();
}

const codes = { code: ['A1', 'B2', 'A3'] };

describe('evaluateChain', () => {
  it('evaluates a chain without ops as its base', () => {
    expect(run(col('code'), codes)).toEqual(['A1', 'B2', 'A3']);
  });

  it('applies ops in order', () => {
    const expression = chain(
      { type: 'column', name: 'name' },
      { type: 'str', op: { type: 'replace', pattern: 'a', value: 'x', literal: true, all: false } },
      { type: 'str', op: { type: 'to_uppercase' } },
    );
    expect(run(expression, { name: ['ab', 'cd'] })).toEqual(['XB', 'CD']);
  });
});

describe('logical expressions', () => {
  it('match tests the column against the pattern', () => {
    expect(run(match('code', '^A'), codes)).toEqual([true, false, true]);
  });

  it('and requires every condition', () => {
    const expression = chain({ type: 'and', conditions: [match('code', '^A'), match('code', '3$')] });
    expect(run(expression, codes)).toEqual([false, false, true]);
  });

  it('or op combines with the incoming value', () => {
    const expression = chain(
      { type: 'match', column: 'code', pattern: '^B' },
      { type: 'or', conditions: [match('code', '3$')] },
    );
    expect(run(expression, codes)).toEqual([false, true, true]);
  });

  it('not negates', () => {
    expect(run(chain({ type: 'not', expr: match('code', '^A') }), codes)).toEqual([false, true, false]);
  });

  it('condition picks then or otherwise per row', () => {
    const expression = chain({
      type: 'condition',
      when: match('code', '^A'),
      then: lit('yes'),
      otherwise: lit('no'),
    });
    expect(run(expression, codes)).toEqual(['yes', 'no', 'yes']);
  });

  it('rejects and/or nodes with fewer than two conditions', () => {
    expect(() => evaluateExpression({ type: 'and', conditions: [match('code', 'A')] })).toThrow(ArityError);
    expect(() => evaluateExpression({ type: 'or', conditions: [] })).toThrow(ArityError);
  });

  it('rejects malformed patterns', () => {
    expect(() => evaluateExpression({ type: 'match', column: 'code', pattern: '(' })).toThrow(InvalidPatternError);
  });
});

describe('value expressions', () => {
  it('concat_str joins columns with the separator', () => {
    const expression = chain({ type: 'concat_str', columns: [col('code'), col('name')], separator: '_', ignoreNulls: false });
    expect(run(expression, { code: ['A1', 'B2'], name: ['x', 'y'] })).toEqual(['A1_x', 'B2_y']);
  });

  it('int_range numbers the rows from start by step', () => {
    const expression = chain({ type: 'int_range', start: 10, step: 5, dtype: 'Int32' });
    expect(run(expression, codes)).toEqual([10, 15, 20]);
  });
});

describe('applyOp', () => {
  const values = { v: ['a', null] };
  const numbers = { n: [1.5, 2.5] };

  it('fill_null replaces nulls', () => {
    expect(run(chain({ type: 'column', name: 'v' }, { type: 'fill_null', value: lit('z') }), values)).toEqual([
      'a',
      'z',
    ]);
  });

  it('is_null and its negation', () => {
    expect(run(chain({ type: 'column', name: 'v' }, { type: 'is_null', value: true }), values)).toEqual([false, true]);
    expect(run(chain({ type: 'column', name: 'v' }, { type: 'is_null', value: false }), values)).toEqual([true, false]);
  });

  it('arithmetic against literals and columns', () => {
    expect(run(chain({ type: 'column', name: 'n' }, { type: 'add', other: lit(1) }), numbers)).toEqual([2.5, 3.5]);
    expect(run(chain({ type: 'column', name: 'n' }, { type: 'mul', other: col('n') }), numbers)).toEqual([2.25, 6.25]);
  });

  it('comparisons', () => {
    expect(run(chain({ type: 'column', name: 'n' }, { type: 'gt', other: lit(2) }), numbers)).toEqual([false, true]);
    expect(run(chain({ type: 'column', name: 'n' }, { type: 'lt_eq', other: lit(1.5) }), numbers)).toEqual([true, false]);
  });

  it('cast converts the datatype', () => {
    expect(run(chain({ type: 'column', name: 'n' }, { type: 'cast', dtype: 'String', strict: true }), numbers)).toEqual([
      '1.5',
      '2.5',
    ]);
  });

  it('extract_groups builds a struct of named groups', () => {
    const expression = chain(
      { type: 'column', name: 'code' },
      { type: 'extract_groups', pattern: '(?P<letter>[A-Z])(?P<digit>\\d)' },
      { type: 'struct', op: { type: 'field', name: 'digit' } },
    );
    expect(run(expression, codes)).toEqual(['1', '2', '3']);
  });

  it('extract_groups needs a capture group', () => {
    expect(() => evaluateChain(chain({ type: 'column', name: 'code' }, { type: 'extract_groups', pattern: 'A' }))).toThrow(
      EtlError,
    );
  });

  it('drop_null removes null values', () => {
    expect(run(chain({ type: 'column', name: 's' }, { type: 'drop_null' }), { s: ['a', null, 'b'] })).toEqual(['a', 'b']);
  });

  it('contains with literal does not treat the pattern as a regex', () => {
    const data = { s: ['x', null, 'a.b', 'acb'] };
    const expression = chain({ type: 'column', name: 's' }, { type: 'contains', pattern: 'a.b', literal: true });
    expect(run(expression, data)).toEqual([false, null, true, false]);
  });

  it('contains matches literally when asked', () => {
    const data = { s: ['a.b', 'ab'] };
    expect(run(chain({ type: 'column', name: 's' }, { type: 'contains', pattern: '.', literal: true }), data)).toEqual([
      true,
      false,
    ]);
  });
});

describe('string ops', () => {
  it('extract returns the requested group', () => {
    const expression = chain(
      { type: 'column', name: 'code' },
      { type: 'str', op: { type: 'extract', pattern: '([A-Z])(\\d)', group: 2 } },
    );
    expect(run(expression, codes)).toEqual(['1', '2', '3']);
  });

  it('literal replace_all substitutes plain text', () => {
    const expression = chain(
      { type: 'column', name: 's' },
      { type: 'str', op: { type: 'replace', pattern: '.', value: '-', literal: true, all: true } },
    );
    expect(run(expression, { s: ['x', null, 'a.b', 'acb'] })).toEqual(['x', null, 'a-b', 'acb']);
  });

  it('literal replace inserts the value verbatim', () => {
    const expression = chain(
      { type: 'column', name: 's' },
      { type: 'str', op: { type: 'replace', pattern: 'b', value: '$1', literal: true, all: false } },
    );
    expect(run(expression, { s: ['ab'] })).toEqual(['a$1']);
  });

  it('regex replace expands capture groups', () => {
    const expression = chain(
      { type: 'column', name: 's' },
      { type: 'str', op: { type: 'replace', pattern: '(a)(b)', value: '$2$1', literal: false, all: false } },
    );
    expect(run(expression, { s: ['abc'] })).toEqual(['bac']);
  });

  it('slice without a length runs to the end', () => {
    const expression = chain({ type: 'column', name: 's' }, { type: 'str', op: { type: 'slice', offset: 1 } });
    expect(run(expression, { s: ['hello', 'ab'] })).toEqual(['ello', 'b']);
  });

  it('strptime parses dates and leaves unparsable values null', () => {
    const expression = chain(
      { type: 'column', name: 's' },
      { type: 'str', op: { type: 'strptime', dtype: 'Date', format: '%Y-%m-%d' } },
      { type: 'cast', dtype: 'String', strict: true },
    );
    expect(run(expression, { s: ['2024-01-15', 'soon'] })).toEqual(['2024-01-15', null]);
  });

  it('strip_chars trims whitespace from both ends', () => {
    const expression = chain({ type: 'column', name: 's' }, { type: 'str', op: { type: 'strip_chars' } });
    expect(run(expression, { s: ['  a ', 'b  '] })).toEqual(['a', 'b']);
  });

  it('strip_chars trims the given characters', () => {
    const expression = chain({ type: 'column', name: 's' }, { type: 'str', op: { type: 'strip_chars', characters: '-]' } });
    expect(run(expression, { s: ['--a]', ']b-c-'] })).toEqual(['a', 'b-c']);
  });

  it('pad_start pads to the length', () => {
    const expression = chain({ type: 'column', name: 's' }, { type: 'str', op: { type: 'pad_start', length: 3, fillChar: '0' } });
    expect(run(expression, { s: ['7', '42'] })).toEqual(['007', '042']);
  });

  it('to_lowercase', () => {
    expect(run(chain({ type: 'column', name: 'code' }, { type: 'str', op: { type: 'to_lowercase' } }), codes)).toEqual([
      'a1',
      'b2',
      'a3',
    ]);
  });
});

describe('list ops', () => {
  const csv = { s: ['a,b', 'c'] };
  const split: OpItem = { type: 'str', op: { type: 'split', by: ',' } };

  it('split then join', () => {
    const expression = chain({ type: 'column', name: 's' }, split, { type: 'list', op: { type: 'join', separator: '|' } });
    expect(run(expression, csv)).toEqual(['a|b', 'c']);
  });

  it('first and last', () => {
    expect(run(chain({ type: 'column', name: 's' }, split, { type: 'list', op: { type: 'first' } }), csv)).toEqual(['a', 'c']);
    expect(run(chain({ type: 'column', name: 's' }, split, { type: 'list', op: { type: 'last' } }), csv)).toEqual(['b', 'c']);
  });

  it('contains tests membership', () => {
    const expression = chain({ type: 'column', name: 's' }, split, { type: 'list', op: { type: 'contains', item: lit('b') } });
    expect(run(expression, csv)).toEqual([true, false]);
  });

  it('eval runs an expression on every element', () => {
    const upper = chain({ type: 'element' }, { type: 'str', op: { type: 'to_uppercase' } });
    const expression = chain(
      { type: 'column', name: 's' },
      split,
      { type: 'list', op: { type: 'eval', expr: upper } },
      { type: 'list', op: { type: 'join', separator: '' } },
    );
    expect(run(expression, csv)).toEqual(['AB', 'C']);
  });
});
