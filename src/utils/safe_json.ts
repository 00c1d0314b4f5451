/**
 * @fileoverview Safe JSON Parsing
 *
 * Parses JSON read back from storage or datasets into validated shapes.
 *
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { Err, Ok, type Result } from '../core/result.js';

/**
 * Safely parse JSON, returning a Result with ok/value/error
 */
export function safeJsonParse(text: string): Result<unknown, Error> {
  try {
    return Ok(JSON.parse(text));
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Parse JSON and check it against a schema in one step.
 */
export function parseJsonAs<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): Result<T, Error> {
  const parsed = safeJsonParse(text);
  if (!parsed.ok) return parsed;
  const validated = schema.safeParse(parsed.value);
  if (!validated.success) {
    return Err(new Error(validated.error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ')));
  }
  return Ok(validated.data);
}

/**
 * Parse JSON and validate it's an object
 */
export function parseJsonObject(text: string): Record<string, unknown> | undefined {
  const parsed = safeJsonParse(text);
  if (parsed.ok && typeof parsed.value === 'object' && parsed.value !== null && !Array.isArray(parsed.value)) {
    return Object.fromEntries(Object.entries(parsed.value));
  }
  return undefined;
}
