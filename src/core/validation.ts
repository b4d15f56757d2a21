/**
 * Validation utilities for safe JSON parsing with Zod schemas
 */

import { ZodType, ZodTypeDef, ZodError } from 'zod';
import { PlanInput } from '../types.js';
import { errorMessage } from './errors.js';

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Safe JSON parse with Zod validation
 */
export function safeParseJson<T>(json: string, schema: ZodType<T, ZodTypeDef, unknown>): ParseResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return { success: false, error: errorMessage(error) || 'Invalid JSON' };
  }
  const result = schema.safeParse(parsed);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error for logging
 */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

/**
 * Parse a normalized plan document (the plan parser's output)
 */
export function parsePlanInput(json: string): ParseResult<PlanInput> {
  return safeParseJson(json, PlanInput);
}
