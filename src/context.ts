import { dirname } from 'node:path';
import { ConfigCycleError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Explicit resolution state threaded through parsing and loading. Relative
 * paths resolve against `baseDirectory`; nested configuration loads get a
 * derived context and never modify the caller's.
 */
export interface ResolveContext {
  readonly baseDirectory: string;
  /** Canonical paths of the configuration files currently being loaded, outermost first */
  readonly configStack: readonly string[];
  readonly logger: Logger;
}

export interface ContextOptions {
  baseDirectory?: string;
  logger?: Logger;
}

export function createContext(options: ContextOptions = {}): ResolveContext {
  return {
    baseDirectory: options.baseDirectory ?? process.cwd(),
    configStack: [],
    logger: options.logger ?? silentLogger,
  };
}

/**
 * Derives the context for a configuration file: its parent directory becomes
 * the base directory and the file is pushed onto the stack.
 * Throws ConfigCycleError when the file is already being loaded.
 */
export function enterConfigFile(ctx: ResolveContext, canonicalPath: string): ResolveContext {
  if (ctx.configStack.includes(canonicalPath)) {
    throw new ConfigCycleError([...ctx.configStack, canonicalPath]);
  }
  return {
    baseDirectory: dirname(canonicalPath),
    configStack: [...ctx.configStack, canonicalPath],
    logger: ctx.logger.child({ config: canonicalPath }),
  };
}
