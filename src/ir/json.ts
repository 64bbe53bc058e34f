import { z } from 'zod';
import type { JsonValue } from './types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/** Parse text that must hold a JSON document; throws on malformed input. */
export function parseJson(text: string): JsonValue {
  const raw: unknown = JSON.parse(text);
  return jsonValueSchema.parse(raw);
}
