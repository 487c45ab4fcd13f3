import pl, { DataType } from 'nodejs-polars';

export const DATA_TYPE_NAMES = [
  'Boolean',
  'String',
  'Int8',
  'Int16',
  'Int32',
  'Int64',
  'UInt8',
  'UInt16',
  'UInt32',
  'UInt64',
  'Float32',
  'Float64',
  'Date',
  'Datetime',
  'Categorical',
  'Null',
] as const;

export type DataTypeName = (typeof DATA_TYPE_NAMES)[number];

/** Alternate spellings accepted in documents, and engine variant names. */
const ALIASES: Readonly<Record<string, DataTypeName>> = {
  Bool: 'Boolean',
  Utf8: 'String',
  Str: 'String',
  Int: 'Int64',
  Float: 'Float64',
};

function isDataTypeName(name: string): name is DataTypeName {
  return DATA_TYPE_NAMES.some((known) => known === name);
}

export function resolveDataTypeName(name: string): DataTypeName | undefined {
  if (isDataTypeName(name)) return name;
  return ALIASES[name];
}

export function toEngineDataType(name: DataTypeName): DataType {
  switch (name) {
    case 'Boolean':
      return DataType.Bool;
    case 'String':
      return DataType.Utf8;
    case 'Int8':
      return DataType.Int8;
    case 'Int16':
      return DataType.Int16;
    case 'Int32':
      return DataType.Int32;
    case 'Int64':
      return DataType.Int64;
    case 'UInt8':
      return DataType.UInt8;
    case 'UInt16':
      return DataType.UInt16;
    case 'UInt32':
      return DataType.UInt32;
    case 'UInt64':
      return DataType.UInt64;
    case 'Float32':
      return DataType.Float32;
    case 'Float64':
      return DataType.Float64;
    case 'Date':
      return DataType.Date;
    case 'Datetime':
      return DataType.Datetime('ms');
    case 'Categorical':
      return DataType.Categorical;
    case 'Null':
      return DataType.Null;
  }
}

/**
 * Maps an engine datatype back to its document name. Returns undefined for
 * nested types (lists, structs) that cannot be pinned by name.
 */
export function fromEngineDataType(dtype: DataType): DataTypeName | undefined {
  return resolveDataTypeName(dtype.variant);
}

export interface ColumnType {
  readonly name: string;
  readonly dtype: DataType;
}

/** Column names and datatypes of a frame, in column order. */
export function frameSchema(frame: pl.DataFrame): ColumnType[] {
  return frame.getColumns().map((series): ColumnType => ({ name: series.name, dtype: series.dtype }));
}

/** Resolves the output schema of a plan without reading any rows. */
export function planSchema(plan: pl.LazyDataFrame): ColumnType[] {
  return frameSchema(plan.head(0).collectSync());
}

export function isStruct(dtype: DataType): dtype is DataType.Struct {
  return dtype.variant === 'Struct';
}
