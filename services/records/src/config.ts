import 'dotenv/config';

export type ServiceKind = 'users' | 'inventory';

function parseService(raw: string | undefined): ServiceKind {
  const value = (raw || 'users').toLowerCase();
  if (value === 'users' || value === 'inventory') return value;
  throw new Error(`Unsupported SERVICE: ${raw}`);
}

export const config = {
  service: parseService(process.env.SERVICE),
  port: parseInt(process.env.PORT || '8000', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  version: process.env.API_VERSION || '1.0.0',
  cors: {
    origin: process.env.CORS_ORIGIN || '*',
  },
  // pagination bounds shared by every listing route
  pagination: {
    maxLimit: 1000,
    defaultLimit: {
      users: 100,
      inventory: 50,
    },
  },
};
