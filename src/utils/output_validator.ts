/**
 * @fileoverview Output Validation Utilities
 *
 * Validates generated text that is supposed to carry JSON (judge verdicts,
 * plan steps) against zod schemas.
 *
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';

// ============================================================================
// TYPES
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; details: string[] };

// ============================================================================
// ERRORS
// ============================================================================

export class OutputValidationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
    public readonly rawOutput?: string,
  ) {
    super(message);
    this.name = 'OutputValidationError';
  }
}

// ============================================================================
// VALIDATORS
// ============================================================================

/**
 * Validate a parsed value against a Zod schema
 */
export function validateJSON<T>(json: unknown, schema: ZodType<T, ZodTypeDef, unknown>): ValidationResult<T> {
  const parsed = schema.safeParse(json);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return {
    success: false,
    error: 'Schema validation failed',
    details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}

/**
 * Validate string is valid JSON and matches schema
 */
export function validateJSONString<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): ValidationResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {
      success: false,
      error: 'Invalid JSON',
      details: ['Could not parse as JSON'],
    };
  }
  return validateJSON(parsed, schema);
}

/**
 * Extract JSON from generated text (handles markdown code blocks)
 */
export function extractJSON(text: string): string {
  const jsonBlockMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (jsonBlockMatch?.[1] !== undefined) {
    return jsonBlockMatch[1].trim();
  }

  const objectMatch = text.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    return objectMatch[0];
  }

  const arrayMatch = text.match(/\[[\s\S]*\]/);
  if (arrayMatch) {
    return arrayMatch[0];
  }

  return text.trim();
}

/**
 * Validate generated output and extract typed data
 */
export function validateLLMOutput<T>(output: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = validateJSONString(extractJSON(output), schema);
  if (!result.success) {
    throw new OutputValidationError(result.error, result.details, output);
  }
  return result.data;
}
