import { createServer } from './server.js';
import { loadConfig } from './config.js';

async function start() {
  const config = loadConfig();
  const app = await createServer({ config });

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info({ port: config.server.port, worker: config.worker.embedded }, 'Skill run jobs service started');

  // Graceful shutdown
  let closing = false;
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

start().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
