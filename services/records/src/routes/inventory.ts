import type { FastifyInstance } from 'fastify';
import type { InventoryServices } from '../services/inventory';
import { deleteByHandle, matchesHandle } from '../services/inventory';
import { notFound } from '../contracts/outcome';
import {
  directoryUserDeleteQuerySchema,
  directoryUserParamsSchema,
  inventoryListQuerySchema,
  itemIdParamsSchema,
} from '../validation/params';
import { badRequest, sendError } from './reply';

export interface InventoryRouteOptions {
  defaultLimit: number;
  clock: () => Date;
}

export async function registerInventoryRoutes(
  app: FastifyInstance,
  { items, users }: InventoryServices,
  opts: InventoryRouteOptions,
) {
  // ---------- Items ----------
  app.get('/inventory', async (req, reply) => {
    const parsed = inventoryListQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error, opts.clock());

    const { skip = 0, limit = opts.defaultLimit, searchString } = parsed.data;
    return reply.send(items.readMany(skip, limit, searchString));
  });

  app.post('/inventory', async (req, reply) => {
    const created = items.create(req.body);
    if (!created.ok) return sendError(reply, created.error, opts.clock());

    req.log.info({ id: created.value.id }, 'Created inventory item');
    return reply.code(201).send({ message: 'item created', id: created.value.id });
  });

  app.get('/inventory/:id', async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error, opts.clock());

    const found = items.read(params.data.id);
    if (!found.ok) return sendError(reply, found.error, opts.clock());
    return reply.send(found.value);
  });

  // ---------- Directory users ----------
  app.post('/users', async (req, reply) => {
    const created = users.create(req.body);
    if (!created.ok) {
      if (created.error.code === 'duplicate_key') {
        return sendError(reply, { ...created.error, message: 'Email already registered' }, opts.clock());
      }
      return sendError(reply, created.error, opts.clock());
    }

    req.log.info({ id: created.value.id }, 'Created directory user');
    return reply.code(201).send({ message: `Hello, ${created.value.username}!`, user: created.value });
  });

  app.get('/users', async (_req, reply) => {
    return reply.send(users.readMany(0, Number.MAX_SAFE_INTEGER));
  });

  app.get('/users/:userId', async (req, reply) => {
    const params = directoryUserParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error, opts.clock());

    const { userId } = params.data;
    const user = users.findFirst(matchesHandle(userId));
    if (!user) return sendError(reply, notFound(userId, 'User not found'), opts.clock());
    return reply.send(user);
  });

  app.delete('/users', async (req, reply) => {
    const parsed = directoryUserDeleteQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error, opts.clock());

    const { userId } = parsed.data;
    const removed = deleteByHandle(users, userId);
    if (removed === 0) return sendError(reply, notFound(userId, 'User not found'), opts.clock());

    req.log.info({ userId, removed }, 'Deleted directory users');
    return reply.code(204).send();
  });
}
