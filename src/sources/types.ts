import type { DataTypeName } from '../engine/datatypes.js';

/** Column name to datatype. CSV files are parsed with it; other formats are cast after reading. */
export type SourceSchema = Readonly<Record<string, DataTypeName>>;

export type InlineValue = string | number | boolean;

export interface InlineColumn {
  readonly name: string;
  readonly datatype?: DataTypeName;
  readonly values: readonly InlineValue[];
}

/**
 * Where row data originates. File paths are absolute and canonical: they are
 * resolved and checked while the document is parsed.
 */
export type SourceItem =
  | {
      readonly type: 'csv';
      readonly paths: readonly string[];
      readonly separator?: string;
      readonly hasHeader: boolean;
      readonly schema?: SourceSchema;
    }
  | { readonly type: 'json_line'; readonly paths: readonly string[]; readonly schema?: SourceSchema }
  | { readonly type: 'json'; readonly path: string; readonly schema?: SourceSchema }
  | { readonly type: 'parquet'; readonly paths: readonly string[]; readonly schema?: SourceSchema }
  | { readonly type: 'inline'; readonly columns: readonly InlineColumn[] }
  | { readonly type: 'config'; readonly path: string };

export type SourceType = SourceItem['type'];
