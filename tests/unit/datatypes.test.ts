import { describe, it, expect } from 'vitest';
import pl, { DataType } from 'nodejs-polars';
import {
  DATA_TYPE_NAMES,
  fromEngineDataType,
  isStruct,
  planSchema,
  resolveDataTypeName,
  toEngineDataType,
} from '../../src/engine/datatypes.js';

describe('resolveDataTypeName', () => {
  it('accepts every canonical name', () => {
    for (const name of DATA_TYPE_NAMES) {
      expect(resolveDataTypeName(name)).toBe(name);
    }
  });

  it('maps alternate spellings', () => {
    expect(resolveDataTypeName('Utf8')).toBe('String');
    expect(resolveDataTypeName('Str')).toBe('String');
    expect(resolveDataTypeName('Bool')).toBe('Boolean');
    expect(resolveDataTypeName('Int')).toBe('Int64');
    expect(resolveDataTypeName('Float')).toBe('Float64');
  });

  it('returns undefined for unknown names', () => {
    expect(resolveDataTypeName('Decimal128')).toBeUndefined();
    expect(resolveDataTypeName('string')).toBeUndefined();
  });
});

describe('engine datatypes', () => {
  it.each(['Boolean', 'String', 'Int32', 'Int64', 'UInt8', 'Float64', 'Date', 'Datetime'] as const)(
    '%s survives a trip through the engine',
    (name) => {
      expect(fromEngineDataType(toEngineDataType(name))).toBe(name);
    },
  );

  it('has no name for nested datatypes', () => {
    expect(fromEngineDataType(DataType.List(DataType.Int64))).toBeUndefined();
  });
});

describe('planSchema', () => {
  it('lists columns in order without collecting rows', () => {
    const plan = pl.DataFrame({ code: ['01', '02'], size: [1.5, 2] }).lazy();
    const schema = planSchema(plan);
    expect(schema.map((column) => column.name)).toEqual(['code', 'size']);
    expect(schema.map((column) => fromEngineDataType(column.dtype))).toEqual(['String', 'Float64']);
  });

  it('recognises struct columns', () => {
    const plan = pl
      .DataFrame({ a: [1, 2], b: ['x', 'y'] })
      .lazy()
      .select(pl.struct([pl.col('a'), pl.col('b')]).alias('pair'));
    const [pair] = planSchema(plan);
    expect(pair?.name).toBe('pair');
    expect(pair !== undefined && isStruct(pair.dtype)).toBe(true);
  });
});
