import { z } from 'zod';
import { config } from '../config';

// query strings arrive as strings; coerce before the numeric checks run
const fromQuery = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v), schema);

export function paginationSchema(maxLimit = config.pagination.maxLimit) {
  return z.object({
    skip: fromQuery(z.number().int().min(0, 'skip must be >= 0')).optional(),
    limit: fromQuery(z.number().int().min(1, 'limit must be >= 1').max(maxLimit, `limit must be <= ${maxLimit}`)).optional(),
  });
}

export const userListQuerySchema = paginationSchema().extend({
  search: z.string().optional(),
});

export const inventoryListQuerySchema = paginationSchema().extend({
  searchString: z.string().optional(),
});

export const userIdParamsSchema = z.object({
  id: fromQuery(z.number().int().positive('id must be a positive integer')),
});

export const itemIdParamsSchema = z.object({
  id: z.string().uuid('id must be a UUID'),
});

export const directoryUserParamsSchema = z.object({
  userId: z.string().min(1),
});

export const directoryUserDeleteQuerySchema = directoryUserParamsSchema;
