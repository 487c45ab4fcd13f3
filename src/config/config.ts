import { readFileSync } from 'node:fs';
import { parse } from 'smol-toml';
import { enterConfigFile, type ResolveContext } from '../context.js';
import { ConfigValidationError } from '../errors.js';
import { canonicalPath } from '../sources/paths.js';
import { createDocumentSchema, formatIssues } from './schema.js';
import type { Config } from '../types.js';

/**
 * Validates an already-decoded document (a TOML table, or any plain object)
 * and returns its AST. Paths resolve against `ctx.baseDirectory`.
 */
export function parseConfigDocument(document: unknown, ctx: ResolveContext, sourceName?: string): Config {
  const result = createDocumentSchema(ctx).safeParse(document);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), sourceName);
  }
  return result.data;
}

export function parseConfig(text: string, ctx: ResolveContext, sourceName?: string): Config {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    throw new ConfigValidationError([err instanceof Error ? err.message : String(err)], sourceName);
  }
  return parseConfigDocument(document, ctx, sourceName);
}

/**
 * Reads and parses a configuration file. Relative paths inside it resolve
 * against the file's own directory.
 */
export function readConfigFile(path: string, ctx: ResolveContext): Config {
  const file = canonicalPath(path, ctx.baseDirectory);
  const fileCtx = enterConfigFile(ctx, file);
  fileCtx.logger.debug('parsing configuration');
  const config = parseConfig(readFileSync(file, 'utf8'), fileCtx, file);
  return { ...config, path: file };
}
