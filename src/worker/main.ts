import { pino } from 'pino';
import { loadConfig } from '../config.js';
import { createStores } from '../stores.js';
import { createExecutor } from '../executors/index.js';
import { JobWorker } from './index.js';

// Standalone worker process; run as many as needed against one database.
async function start() {
  const config = loadConfig();
  const log = pino({ level: config.server.logLevel, base: { component: 'worker', pid: process.pid } });

  const stores = await createStores(config);
  if (stores.kind === 'memory') {
    log.warn('REPO_KIND=memory: this worker only sees jobs created inside its own process');
  }

  const executor = createExecutor(config.executor.kind, {
    catalog: stores.catalog,
    preview: {
      delayMs: config.executor.previewDelayMs,
      maxPreviewChars: config.executor.previewMaxChars,
    },
  });
  const worker = new JobWorker(stores.repo, executor, config.worker, log);
  await worker.start();

  let closing = false;
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      log.info({ signal }, 'Shutting down');
      worker.stop()
        .then(() => stores.close())
        .then(
          () => process.exit(0),
          (error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          }
        );
    });
  }
}

start().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
