import { z } from 'zod';
import { optionalField } from '../../common/validation/fields';

export const verifySchema = z.object({
  similarity_threshold: optionalField(z.coerce.number().min(0).max(100)),
});
