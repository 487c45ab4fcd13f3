import pl, { DataType } from 'nodejs-polars';
import { planSchema, toEngineDataType } from '../engine/datatypes.js';
import { EtlError } from '../errors.js';
import { loadConfigFile } from '../config/load.js';
import type { ResolveContext } from '../context.js';
import type { InlineColumn, SourceItem, SourceSchema } from './types.js';

type CsvSource = Extract<SourceItem, { type: 'csv' }>;

function scanAll(paths: readonly string[], scan: (path: string) => pl.LazyDataFrame): pl.LazyDataFrame {
  const [first, ...rest] = paths.map(scan);
  if (first === undefined) {
    throw new EtlError('source has no files to scan');
  }
  return rest.length === 0 ? first : pl.concat([first, ...rest], { how: 'vertical' });
}

function applySchema(plan: pl.LazyDataFrame, schema: SourceSchema | undefined): pl.LazyDataFrame {
  if (schema === undefined) return plan;
  const casts = Object.entries(schema).map(([name, dtype]) => pl.col(name).cast(toEngineDataType(dtype)));
  return casts.length === 0 ? plan : plan.withColumns(...casts);
}

/**
 * Pins the given columns when the file is parsed, so a column inferred as a
 * number can still be read as text with its leading zeros.
 */
function scanCsvFile(path: string, source: CsvSource): pl.LazyDataFrame {
  const options = {
    hasHeader: source.hasHeader,
    truncateRaggedLines: true,
    ...(source.separator !== undefined && { sep: source.separator }),
  };
  const overrides = source.schema;
  if (overrides === undefined || Object.keys(overrides).length === 0) {
    return pl.scanCSV(path, options);
  }
  const inferred = planSchema(pl.scanCSV(path, options));
  const schema: Record<string, DataType> = {};
  for (const { name, dtype } of inferred) {
    const pinned = overrides[name];
    schema[name] = pinned === undefined ? dtype : toEngineDataType(pinned);
  }
  const missing = Object.fromEntries(Object.entries(overrides).filter(([name]) => !(name in schema)));
  return applySchema(pl.scanCSV(path, { ...options, schema }), missing);
}

function inlineSeries(column: InlineColumn): pl.Series {
  const values = [...column.values];
  return column.datatype === undefined
    ? pl.Series(column.name, values)
    : pl.Series(column.name, values, toEngineDataType(column.datatype));
}

/** Builds the lazy plan that reads a source. Nothing is read until collected. */
export function loadSource(source: SourceItem, ctx: ResolveContext): pl.LazyDataFrame {
  ctx.logger.debug({ source: source.type }, 'loading source');
  switch (source.type) {
    case 'csv':
      return scanAll(source.paths, (path) => scanCsvFile(path, source));
    case 'json_line':
      return applySchema(
        scanAll(source.paths, (path) => pl.scanJson(path)),
        source.schema,
      );
    case 'json':
      return applySchema(pl.readJSON(source.path, { format: 'json' }).lazy(), source.schema);
    case 'parquet':
      return applySchema(
        scanAll(source.paths, (path) => pl.scanParquet(path)),
        source.schema,
      );
    case 'inline':
      return pl.DataFrame(source.columns.map(inlineSeries)).lazy();
    case 'config':
      return loadConfigFile(source.path, ctx);
  }
}
