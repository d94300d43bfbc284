import { buildApp } from './server';
import { config } from './config';

/**
 * Main entrypoint for the combined lookup service.
 * Builds the Fastify app with logging enabled and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Combined lookup server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

main().catch((err) => {
  // anything thrown before the logger exists
  console.error('Fatal error starting combined lookup server:', err);
  process.exit(1);
});
