import type pl from 'nodejs-polars';
import { systemClock } from '../clock.js';
import { createContext, enterConfigFile, type ResolveContext } from '../context.js';
import { NoExportsError } from '../errors.js';
import { exportPlan } from '../exports/export.js';
import { silentLogger } from '../logger.js';
import { loadSource } from '../sources/load.js';
import { foldTransforms } from '../transforms/apply.js';
import { readConfigFile } from './config.js';
import type { Config, Loader, RunOptions } from '../types.js';

export function loadLoader(loader: Loader, ctx: ResolveContext): pl.LazyDataFrame {
  return foldTransforms(loadSource(loader.source, ctx), loader.transforms, ctx);
}

/** Builds the plan of a configuration: the loader, then the document-level transforms. */
export function loadConfig(config: Config, ctx: ResolveContext): pl.LazyDataFrame {
  const configCtx = config.path === undefined ? ctx : enterConfigFile(ctx, config.path);
  return foldTransforms(loadLoader(config.source, configCtx), config.transforms, configCtx);
}

export function loadConfigFile(path: string, ctx: ResolveContext): pl.LazyDataFrame {
  return loadConfig(readConfigFile(path, ctx), ctx);
}

/**
 * Loads the configuration once and writes it to every export in order.
 * Returns the written file paths.
 */
export function runConfig(config: Config, options: RunOptions = {}): string[] {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? systemClock;
  if (config.exports.length === 0) {
    throw new NoExportsError();
  }
  const plan = loadConfig(config, createContext({ logger }));
  return config.exports.map((item) => exportPlan(item, plan.clone(), { clock, logger }));
}
