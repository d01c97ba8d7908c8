import { z, type ZodTypeAny } from 'zod';

// Subjects double as the gateway's external image id, which only accepts this alphabet.
export const subjectIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z0-9_.\-:]+$/, 'user_id may only contain letters, digits and the characters _ . - :');

/** Multipart forms send blank inputs as empty strings; treat them as absent. */
export function optionalField<T extends ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}
