import { Hono } from 'hono';
import { Logger } from '../common/logger.js';
import { resolveTimeZone } from '../config/tracker.config.js';
import type { TrackerConfig } from '../config/tracker-config.interface.js';
import { DashboardService } from '../modules/dashboard/dashboard.service.js';
import { StatsService } from '../modules/stats/stats.service.js';
import type { TrackerStorage } from '../modules/storage/interfaces/tracker-storage.interface.js';
import { registerRoutes } from './routes.js';

export interface CreateAppOptions {
  config: TrackerConfig;
  storage: TrackerStorage;
  publicPath?: string;
  now?: () => Date;
}

/**
 * Dashboard HTTP application
 */
export function createApp(options: CreateAppOptions): Hono {
  const logger = new Logger('App');
  const { config, storage } = options;

  const statsService = new StatsService({
    storage,
    timeZone: resolveTimeZone(config.timezone, logger),
    earnings: config.earnings,
  });

  const dashboardService = new DashboardService({ publicPath: options.publicPath });

  const app = new Hono();

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.debug(`${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - startedAt}ms`);
  });

  registerRoutes(app, {
    logger,
    config,
    statsService,
    dashboardService,
    now: options.now ?? (() => new Date()),
  });

  return app;
}
