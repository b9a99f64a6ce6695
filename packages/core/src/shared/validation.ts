import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export function formatZodIssues(error: ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Parse input with a zod schema, converting failures into a domain error
 */
export function parseInput<Output>(
  schema: ZodType<Output, ZodTypeDef, unknown>,
  input: unknown,
  toError: (message: string) => Error
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toError(`Validation failed: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
