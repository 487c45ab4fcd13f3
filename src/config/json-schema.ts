import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { createContext } from '../context.js';
import { createDocumentSchema } from './schema.js';

/** JSON Schema of the configuration document, as written (before defaults and path resolution). */
export function configJsonSchema(): ReturnType<typeof zodToJsonSchema> {
  // widened so the generator does not instantiate the recursive document type
  const document: z.ZodTypeAny = createDocumentSchema(createContext());
  return zodToJsonSchema(document, {
    name: 'Config',
    effectStrategy: 'input',
    $refStrategy: 'root',
  });
}
