import { z } from 'zod';
import type { UserFields } from '../types';
import type { FieldSchema } from './validate';

export const userSchema = z.object({
  name: z.string().min(1, 'name required').max(100, 'name must be at most 100 characters'),
  email: z.string().email('email must be a valid address'),
  // null is accepted and treated the same as an absent age
  age: z
    .number()
    .int()
    .min(0, 'age must be between 0 and 150')
    .max(150, 'age must be between 0 and 150')
    .nullish()
    .transform((v) => v ?? undefined),
  is_active: z.boolean().default(true),
});

export const userFieldsSchema: FieldSchema<UserFields> = userSchema;
