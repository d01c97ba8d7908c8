import type { ZodTypeAny, z } from 'zod';
import { AppError } from '../common/errors/app-error';

/** Parses request input against a schema, failing the request with 400 on mismatch. */
export function parseRequest<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new AppError(400, 'VALIDATION_ERROR', 'Request validation failed', result.error.flatten().fieldErrors);
  }
  return result.data;
}
