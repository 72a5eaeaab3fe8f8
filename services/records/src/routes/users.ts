import type { FastifyInstance } from 'fastify';
import type { UserService } from '../services/users';
import type { UserRecord } from '../types';
import { userIdParamsSchema, userListQuerySchema } from '../validation/params';
import { badRequest, sendError } from './reply';

export interface UserRouteOptions {
  defaultLimit: number;
  clock: () => Date;
}

export function toUserJson(user: UserRecord) {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    age: user.age ?? null,
    is_active: user.is_active,
    created_at: user.created_at,
  };
}

export async function registerUserRoutes(app: FastifyInstance, users: UserService, opts: UserRouteOptions) {
  // Create
  app.post('/users', async (req, reply) => {
    const created = users.create(req.body);
    if (!created.ok) {
      if (created.error.code === 'duplicate_key') {
        return sendError(reply, { ...created.error, message: 'Email already registered' }, opts.clock());
      }
      return sendError(reply, created.error, opts.clock());
    }

    req.log.info({ id: created.value.id }, 'Created user');
    return reply.code(201).send(toUserJson(created.value));
  });

  // List / search
  app.get('/users', async (req, reply) => {
    const parsed = userListQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error, opts.clock());

    const { skip = 0, limit = opts.defaultLimit, search } = parsed.data;
    return reply.send(users.readMany(skip, limit, search).map(toUserJson));
  });

  // Read
  app.get('/users/:id', async (req, reply) => {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error, opts.clock());

    const found = users.read(params.data.id);
    if (!found.ok) return sendError(reply, found.error, opts.clock());
    return reply.send(toUserJson(found.value));
  });

  // Replace
  app.put('/users/:id', async (req, reply) => {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error, opts.clock());

    const updated = users.update(params.data.id, req.body);
    if (!updated.ok) {
      if (updated.error.code === 'duplicate_key') {
        return sendError(reply, { ...updated.error, message: 'Email already registered' }, opts.clock());
      }
      return sendError(reply, updated.error, opts.clock());
    }

    req.log.info({ id: updated.value.id }, 'Updated user');
    return reply.send(toUserJson(updated.value));
  });

  // Delete
  app.delete('/users/:id', async (req, reply) => {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error, opts.clock());

    const removed = users.delete(params.data.id);
    if (!removed.ok) return sendError(reply, removed.error, opts.clock());

    req.log.info({ id: params.data.id }, 'Deleted user');
    return reply.code(204).send();
  });

  app.get('/analytics', async () => {
    const { total, matchingPredicateCount } = users.stats();
    return {
      total_users: total,
      active_users: matchingPredicateCount,
      inactive_users: total - matchingPredicateCount,
      timestamp: opts.clock().toISOString(),
    };
  });
}
