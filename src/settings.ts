import { z } from 'zod';
import { ConfigValidationError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const settingsSchema = z.object({
  DETL_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DETL_INFER_ROWS: z.coerce.number().int().positive().default(1000),
});

export interface Settings {
  logLevel: (typeof LOG_LEVELS)[number];
  /** Rows sampled by `infer-schema` when no --rows option is given */
  inferRows: number;
}

/**
 * Reads process settings from the environment. Unrelated variables are ignored.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const result = settingsSchema.safeParse({
    DETL_LOG_LEVEL: env['DETL_LOG_LEVEL'],
    DETL_INFER_ROWS: env['DETL_INFER_ROWS'],
  });
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      'environment',
    );
  }
  return {
    logLevel: result.data.DETL_LOG_LEVEL,
    inferRows: result.data.DETL_INFER_ROWS,
  };
}
