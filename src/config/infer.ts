import { fromEngineDataType, type DataTypeName } from '../engine/datatypes.js';
import { EtlError } from '../errors.js';
import { loadSource } from '../sources/load.js';
import type { ResolveContext } from '../context.js';
import type { Loader } from '../types.js';

const SCHEMA_SOURCES: ReadonlySet<unknown> = new Set(['csv', 'json', 'json_line', 'parquet']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the first `rows` rows of the loader's source, before its transforms,
 * and returns the datatype of each column. Nested columns are left out.
 */
export function inferSourceSchema(loader: Loader, ctx: ResolveContext, rows: number): Record<string, DataTypeName> {
  const frame = loadSource(loader.source, ctx).head(rows).collectSync();
  const schema: Record<string, DataTypeName> = {};
  for (const [column, dtype] of Object.entries(frame.schema)) {
    const name = fromEngineDataType(dtype);
    if (name === undefined) {
      ctx.logger.debug({ column, dtype: String(dtype) }, 'skipping column with nested datatype');
      continue;
    }
    schema[column] = name;
  }
  return schema;
}

/** Returns a copy of a raw document with `source.schema` replaced. */
export function spliceSchema(
  document: Record<string, unknown>,
  schema: Readonly<Record<string, DataTypeName>>,
): Record<string, unknown> {
  const source = document['source'];
  if (!isRecord(source)) {
    throw new EtlError('document has no [source] table');
  }
  if (!SCHEMA_SOURCES.has(source['type'])) {
    throw new EtlError(`source type ${JSON.stringify(source['type'])} does not take a schema`);
  }
  return { ...document, source: { ...source, schema: { ...schema } } };
}
