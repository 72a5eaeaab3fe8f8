import type { FastifyInstance } from 'fastify';

export interface HealthRouteOptions {
  version: string;
  clock: () => Date;
  welcome?: string;
}

export async function registerHealthRoutes(app: FastifyInstance, opts: HealthRouteOptions) {
  const startedAt = opts.clock().getTime();

  app.get('/health', async () => {
    const now = opts.clock();
    return {
      status: 'healthy',
      timestamp: now.toISOString(),
      version: opts.version,
      uptime: (now.getTime() - startedAt) / 1000,
    };
  });

  if (opts.welcome) {
    const message = opts.welcome;
    app.get('/', async () => ({ message, health: '/health', version: opts.version }));
  }
}
