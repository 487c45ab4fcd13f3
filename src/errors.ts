/**
 * Base class for every error raised while parsing, loading or exporting a
 * configuration. Also used directly for conditions with no dedicated kind.
 */
export class EtlError extends Error {
  override readonly name: string = 'EtlError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PathError extends EtlError {
  override readonly name = 'PathError';

  constructor(
    readonly path: string,
    readonly baseDirectory: string,
    message?: string,
    cause?: unknown,
  ) {
    super(message ?? `Path "${path}" does not exist (resolved against ${baseDirectory})`, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigValidationError extends EtlError {
  override readonly name = 'ConfigValidationError';

  constructor(
    readonly issues: readonly string[],
    readonly source?: string,
  ) {
    super(
      `Invalid configuration${source !== undefined ? ` in ${source}` : ''}:\n` +
        issues.map((issue) => `  - ${issue}`).join('\n'),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ArityError extends EtlError {
  override readonly name = 'ArityError';

  constructor(
    readonly kind: 'and' | 'or',
    readonly count: number,
  ) {
    super(`${kind} statement must have at least 2 conditions (got ${count})`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidPatternError extends EtlError {
  override readonly name = 'InvalidPatternError';

  constructor(
    readonly pattern: string,
    cause?: unknown,
  ) {
    super(`Invalid regular expression ${JSON.stringify(pattern)}: ${String(cause)}`, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigCycleError extends EtlError {
  override readonly name = 'ConfigCycleError';

  constructor(readonly chain: readonly string[]) {
    super(`Configuration includes itself: ${chain.join(' -> ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NoExportsError extends EtlError {
  override readonly name = 'NoExportsError';

  constructor() {
    super('must define at least one export');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Failure surfaced by the dataframe engine, tagged with the node that produced it. */
export class EngineError extends EtlError {
  override readonly name = 'EngineError';

  constructor(
    readonly node: string,
    cause: unknown,
  ) {
    super(`Failed to apply ${node}: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ExportError extends EtlError {
  override readonly name = 'ExportError';

  constructor(
    readonly destination: string,
    cause: unknown,
  ) {
    super(`Failed to export to ${destination}: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
