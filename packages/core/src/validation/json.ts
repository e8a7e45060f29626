import { z } from 'zod';
import type { ElementRecord, JsonValue } from '../types/index.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/** One element record: non-empty `@id` and `@type`, any other JSON properties */
export const elementRecordSchema: z.ZodType<ElementRecord> = z
  .object({
    '@id': z.string().min(1),
    '@type': z.string().min(1),
  })
  .catchall(jsonValueSchema);
