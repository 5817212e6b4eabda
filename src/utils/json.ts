import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema = z.record(jsonValueSchema);

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse text that must hold a JSON object. */
export function parseJsonObject(text: string, field = 'payload'): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`not valid JSON (${error instanceof Error ? error.message : String(error)})`, field);
  }
  if (!isJsonObject(parsed)) {
    throw new ValidationError('expected a JSON object', field);
  }
  return parsed;
}
