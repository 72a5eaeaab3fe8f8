import { buildApp } from './server';
import { config } from './config';

/**
 * Main entrypoint.
 * Builds the service selected by SERVICE and listens on the configured host/port.
 */
async function main() {
  const app = await buildApp({ service: config.service, logger: { level: config.logLevel } });

  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down ${config.service} service`);
    await app.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      app.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`${config.service} service listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting service:', err);
  process.exit(1);
});
