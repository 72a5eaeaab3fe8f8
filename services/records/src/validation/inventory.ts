import { z } from 'zod';
import type { DirectoryUserFields, InventoryItemFields } from '../types';
import type { FieldSchema } from './validate';

const manufacturerSchema = z.object({
  name: z.string().min(1, 'manufacturer name required').max(100),
  homePage: z.string().optional(),
  phone: z.string().optional(),
});

export const inventoryItemSchema = z.object({
  name: z.string().min(1, 'name required').max(100),
  releaseDate: z.string().datetime({ offset: true, local: true, message: 'releaseDate must be an ISO-8601 date-time' }),
  manufacturer: manufacturerSchema,
});

export const directoryUserSchema = z.object({
  username: z.string().min(1, 'username required').max(100),
  email: z.string().email('email must be a valid address'),
});

export const inventoryItemFieldsSchema: FieldSchema<InventoryItemFields> = inventoryItemSchema;
export const directoryUserFieldsSchema: FieldSchema<DirectoryUserFields> = directoryUserSchema;
