import 'reflect-metadata';
import { serve } from '@hono/node-server';
import { Logger, setLogLevel } from './common/logger.js';
import { loadEnvironmentFiles, loadTrackerConfig } from './config/tracker.config.js';
import { createApp } from './http/create-app.js';
import { ShutdownService } from './modules/shutdown/shutdown.service.js';
import { TrackerStorageFactory } from './modules/storage/storage/tracker-storage.factory.js';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  loadEnvironmentFiles();
  const config = loadTrackerConfig();

  setLogLevel(config.logLevel);

  const storage = TrackerStorageFactory.create(config.storage);
  await storage.init();

  const app = createApp({ config, storage });
  const { host, port } = config.dashboard;

  const server = serve({ fetch: app.fetch, hostname: host, port }, info => {
    logger.log(`📊 Dashboard is running on: http://${info.address}:${info.port}/`);
  });

  if (!config.dashboard.password) {
    logger.warn('DASHBOARD_PASSWORD is empty, the dashboard is public');
  }

  const shutdownService = new ShutdownService();
  shutdownService.onShutdown('storage', () => storage.close());
  shutdownService.onShutdown(
    'http',
    () =>
      new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      }),
  );
  shutdownService.listen();
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start dashboard', error);
  process.exit(1);
});
