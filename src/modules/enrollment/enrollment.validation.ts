import { z } from 'zod';
import { optionalField, subjectIdSchema } from '../../common/validation/fields';

export const registerSchema = z.object({
  user_id: subjectIdSchema,
  full_name: optionalField(z.string().trim().max(200)),
  email: optionalField(z.string().trim().email()),
});
