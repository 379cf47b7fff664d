/**
 * Zod Schema Utilities
 *
 * Shared validation helpers so every schema reports errors the same way:
 * one string per issue, prefixed with the dotted path of the offending field.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Format Zod issues as "path: message" strings
 *
 * @example
 * formatZodIssues(error.issues);
 * // => ['renderer.timeoutMs: Number must be greater than 0']
 */
export function formatZodIssues(issues: z.ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Create a type-safe validator function from a Zod schema
 *
 * @example
 * ```typescript
 * const result = safeValidateConfig(yamlData);
 * if (result.success) {
 *   console.log(result.data.renderer.binary);
 * } else {
 *   console.error(result.errors.join('\n'));
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown):
    | { success: true; data: z.infer<T> }
    | { success: false; errors: string[] } {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    return { success: false, errors: formatZodIssues(result.error.issues) };
  };
}

/**
 * Create a strict validator function from a Zod schema
 *
 * Throws the ZodError on failure (for data that must be valid).
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.infer<T> {
    return schema.parse(data);
  };
}
