import { resolve } from 'node:path';
import { z } from 'zod';
import type { ResolveContext } from '../context.js';
import type { ExportItem } from './types.js';

const fileShape = {
  folder: z.string().min(1),
  name: z.string().min(1),
  date_format: z.string().min(1).optional(),
};

/** Export folders resolve against the document's directory. */
export function createExportSchema(ctx: ResolveContext) {
  return z
    .discriminatedUnion('type', [
      z.object({ type: z.literal('csv'), ...fileShape, sink: z.boolean().default(false) }).strict(),
      z.object({ type: z.literal('nd_json'), ...fileShape }).strict(),
      z.object({ type: z.literal('json'), ...fileShape }).strict(),
    ])
    .transform(({ folder, date_format, ...rest }): ExportItem => ({
      ...rest,
      folder: resolve(ctx.baseDirectory, folder),
      ...(date_format !== undefined && { dateFormat: date_format }),
    }));
}
