import './env_bootstrap.js';
import { loadConfig } from './config.js';
import { createApp } from './http/app.js';
import { buildRuntime } from './runtime.js';
import { errorMessage } from './engine/errors.js';
import { logError, logInfo } from './util/logger.js';

async function main() {
  const config = loadConfig();
  const runtime = buildRuntime(config);
  const app = createApp(runtime);
  const server = app.listen(config.port, config.host, () => {
    logInfo(`listening on http://${config.host}:${config.port}`, { store: config.storeDriver });
  });

  const shutdown = (signal: string) => {
    logInfo('shutting down', { signal });
    server.close(() => {
      runtime.store.close().then(
        () => process.exit(0),
        err => {
          logError('store close failed', { error: errorMessage(err) });
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(e => {
  logError('startup failed', { error: errorMessage(e) });
  process.exit(1);
});
