import { bootstrap } from './bootstrap';
import { loadConfig } from './config/Config';
import { toError } from './core/types/Logger';

const main = async (): Promise<void> => {
  const app = await bootstrap(loadConfig());
  await app.server.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    app.logger.info(`Received ${signal}, shutting down`);
    app.server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        app.logger.error('Shutdown failed', toError(error));
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

main().catch((error: unknown) => {
  console.error('Failed to start server:', toError(error).message);
  process.exit(1);
});
