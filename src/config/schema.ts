import { z } from 'zod';
import { createExportSchema } from '../exports/schema.js';
import {
  configSourceShape,
  csvSourceShape,
  inlineSourceShape,
  jsonLineSourceShape,
  jsonSourceShape,
  parquetSourceShape,
  toSourceItem,
} from '../sources/schema.js';
import { createTransformSchema } from '../transforms/schema.js';
import type { ResolveContext } from '../context.js';
import type { Config, Loader } from '../types.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Builds the schema of a whole document. Paths inside it resolve against
 * `ctx.baseDirectory` while parsing, so the schema is bound to one context.
 */
export function createDocumentSchema(ctx: ResolveContext): Schema<Config> {
  const loaderSchema: Schema<Loader> = z.lazy(() => loaderDocumentSchema);
  const transformSchema = createTransformSchema(loaderSchema);
  const transforms = { transforms: z.array(transformSchema).default([]) };

  const loaderDocumentSchema = z
    .discriminatedUnion('type', [
      z.object({ ...csvSourceShape, ...transforms }).strict(),
      z.object({ ...jsonLineSourceShape, ...transforms }).strict(),
      z.object({ ...jsonSourceShape, ...transforms }).strict(),
      z.object({ ...parquetSourceShape, ...transforms }).strict(),
      z.object({ ...inlineSourceShape, ...transforms }).strict(),
      z.object({ ...configSourceShape, ...transforms }).strict(),
    ])
    .transform(({ transforms, ...source }): Loader => ({ source: toSourceItem(source, ctx), transforms }));

  return z
    .object({
      source: loaderSchema,
      ...transforms,
      exports: z.array(createExportSchema(ctx)).default([]),
    })
    .strict();
}

function isShapeMismatch(error: z.ZodError, depth: number): boolean {
  return error.issues.every((issue) => issue.code === z.ZodIssueCode.invalid_type && issue.path.length === depth);
}

/**
 * Replaces a failed union with the issues of its only member that matched the
 * value's shape, so a chain written as an object reports what is wrong inside
 * it instead of "Invalid input".
 */
function unwrapUnions(issues: readonly z.ZodIssue[]): z.ZodIssue[] {
  return issues.flatMap((issue) => {
    if (issue.code !== z.ZodIssueCode.invalid_union) return [issue];
    const candidates = issue.unionErrors.filter((error) => !isShapeMismatch(error, issue.path.length));
    const [only] = candidates;
    return candidates.length === 1 && only !== undefined ? unwrapUnions(only.issues) : [issue];
  });
}

/** `<dotted.path>: <message>` per issue */
export function formatIssues(error: z.ZodError): string[] {
  return unwrapUnions(error.issues).map((issue) =>
    issue.path.length === 0 ? issue.message : `${issue.path.join('.')}: ${issue.message}`,
  );
}
