import { buildApp } from './server';
import { config } from './config';
import { closeRedis } from './redis/client';

/**
 * Main entrypoint for the inventory service.
 * Builds the app with the configured store, and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  app.addHook('onClose', async () => {
    await closeRedis();
  });

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Inventory server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting inventory service:', err);
  process.exit(1);
});
