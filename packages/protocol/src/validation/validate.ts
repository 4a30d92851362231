// Schema validation with a protocol-style result

import type { z } from 'zod';

/**
 * A single schema violation
 */
export type SchemaValidationError = {
  path: string;
  message: string;
};

/**
 * A schema that accepts any input and yields T
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type SchemaValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: undefined; errors: SchemaValidationError[] };

/**
 * Validate input against a schema without throwing.
 *
 * @example
 * ```typescript
 * const result = validateWith(ChangeRecordSchema, JSON.parse(line));
 * if (!result.valid) {
 *   console.warn(result.errors);
 * }
 * ```
 */
export function validateWith<T>(
  schema: Schema<T>,
  input: unknown
): SchemaValidationResult<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { valid: true, data: parsed.data, errors: [] };
  }

  return {
    valid: false,
    data: undefined,
    errors: parsed.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    })),
  };
}

/**
 * Format validation errors as one line for log and error messages.
 */
export function formatValidationErrors(errors: SchemaValidationError[]): string {
  return errors.map((error) => `${error.path}: ${error.message}`).join('; ');
}
