import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config } from './config';
import type { ServiceKind } from './config';
import { registerHealthRoutes } from './routes/health';
import { registerUserRoutes } from './routes/users';
import { registerInventoryRoutes } from './routes/inventory';
import { createUserService } from './services/users';
import { createInventoryServices } from './services/inventory';

export interface AppOptions {
  service?: ServiceKind;
  logger?: boolean | { level: string };
  clock?: () => Date;
  generateId?: () => string;
  version?: string;
  corsOrigin?: string;
}

/**
 * Builds a Fastify instance for one of the two services without listening.
 * Every call creates fresh stores, so instances never share records.
 */
export async function buildApp(options: AppOptions = {}) {
  const service = options.service ?? config.service;
  const clock = options.clock ?? (() => new Date());
  const version = options.version ?? config.version;

  const app = Fastify({ logger: options.logger ?? false });

  await app.register(cors, { origin: options.corsOrigin ?? config.cors.origin });

  app.setErrorHandler((err, req, reply) => {
    const timestamp = clock().toISOString();
    // body parser and other client-side failures keep their status
    if (err.statusCode && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: 'bad_request', detail: err.message, timestamp });
    }
    req.log.error({ err }, 'Unhandled error');
    return reply.code(500).send({ error: 'internal_error', detail: 'Internal server error', timestamp });
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({
      error: 'not_found',
      detail: `Route ${req.method} ${req.url} not found`,
      timestamp: clock().toISOString(),
    });
  });

  if (service === 'users') {
    await registerHealthRoutes(app, { version, clock, welcome: 'Welcome to the user management API' });
    await registerUserRoutes(app, createUserService({ clock }), {
      defaultLimit: config.pagination.defaultLimit.users,
      clock,
    });
  } else {
    await registerHealthRoutes(app, { version, clock });
    await registerInventoryRoutes(app, createInventoryServices({ clock, generateId: options.generateId }), {
      defaultLimit: config.pagination.defaultLimit.inventory,
      clock,
    });
  }

  return app;
}
