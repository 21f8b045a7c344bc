import type { Context, Hono } from 'hono';
import type { LoggerLike } from '../common/logger.js';
import type { TrackerConfig } from '../config/tracker-config.interface.js';
import type { DashboardService } from '../modules/dashboard/dashboard.service.js';
import { ACCESS_DENIED_HTML } from '../modules/dashboard/dashboard.service.js';
import type { StatsService } from '../modules/stats/stats.service.js';
import { ArticlesQueryDto } from '../modules/stats/dto/articles-query.dto.js';
import { ForbiddenError, HttpError, NotFoundError } from '../common/http-errors.js';
import { isAuthorized } from './access-key.js';
import { parseQuery } from './validation.js';

export function registerRoutes(
  app: Hono,
  deps: {
    logger: LoggerLike;
    config: TrackerConfig;
    statsService: StatsService;
    dashboardService: DashboardService;
    now: () => Date;
  },
): void {
  const password = deps.config.dashboard.password;

  const requireKey = (c: Context): void => {
    if (!isAuthorized(password, c.req.query('key'))) {
      throw new ForbiddenError();
    }
  };

  app.onError((err: Error, c: Context) => {
    if (err instanceof HttpError) {
      return c.json(err.body ?? { message: err.message }, err.statusCode);
    }

    const message = err instanceof Error ? err.message : String(err);
    deps.logger.error(message, err);

    return c.json(
      {
        statusCode: 500,
        timestamp: new Date().toISOString(),
        path: c.req.path,
        method: c.req.method,
        message,
        error: 'InternalServerError',
      },
      500,
    );
  });

  app.notFound((c: Context) =>
    c.json(
      { statusCode: 404, message: `Cannot ${c.req.method} ${c.req.path}`, error: 'Not Found' },
      404,
    ),
  );

  // Health
  app.get('/api/health', (c: Context) => c.json({ status: 'ok' }));

  // Stats
  app.get('/api/stats', async (c: Context) => {
    requireKey(c);
    return c.json(await deps.statsService.getSummary(deps.now()));
  });

  app.get('/api/dashboard', async (c: Context) => {
    requireKey(c);
    return c.json(await deps.statsService.getDashboard(deps.now()));
  });

  app.get('/api/articles', async (c: Context) => {
    requireKey(c);
    const { limit, offset } = parseQuery({ dtoClass: ArticlesQueryDto, query: c.req.queries() });
    const articles = await deps.statsService.getArticles(limit, offset);

    return c.json({ articles, limit, offset });
  });

  // Dashboard UI
  app.get('/', async (c: Context) => {
    const key = c.req.query('key') ?? '';
    if (!isAuthorized(password, key)) {
      return c.html(ACCESS_DENIED_HTML, 403);
    }

    const html = await deps.dashboardService.renderIndex(key);
    if (html === null) {
      throw new NotFoundError('Dashboard page not found');
    }
    return c.html(html);
  });

  const serveAsset = async (c: Context, filename: string): Promise<Response> => {
    const asset = await deps.dashboardService.readAsset(filename);
    if (!asset) {
      throw new NotFoundError('File not found');
    }
    c.header('Content-Type', asset.contentType);
    return c.body(asset.content);
  };

  app.get('/styles.css', (c: Context) => serveAsset(c, 'styles.css'));
  app.get('/app.js', (c: Context) => serveAsset(c, 'app.js'));
}
