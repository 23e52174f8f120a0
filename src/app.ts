import express from 'express';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { config } from './config.js';
import { logger } from './logger.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import type { RouteProcessor } from './routeProcessor.js';
import { createPlanRouteRouter } from './routes/planRoute.js';
import { createStationsRouter } from './routes/stations.js';
import type { StationRepository } from './stations/repository.js';

export type AppDeps = {
  processor: RouteProcessor;
  stations: StationRepository;
};

export function createApp({ processor, stations }: AppDeps): express.Express {
  const app = express();

  // Remove Express version disclosure
  app.disable('x-powered-by');

  // Trust proxy for correct client IP behind a reverse proxy (rate limiting keys on it)
  app.set('trust proxy', 1);

  // Security headers (API-relevant only; CSP/COOP/COEP omitted as they apply to HTML documents)
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  // Request logging
  app.use(pinoHttp({
    logger,
    autoLogging: {
      ignore: (req) => req.url?.startsWith('/api/health') ?? false,
    },
    customSuccessMessage: (req, res) => {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },
    customErrorMessage: (req, res, err) => {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },
    serializers: {
      res: (res) => ({
        statusCode: res.statusCode,
      }),
      req: (req) => ({
        id: req.id,
        method: req.method,
        url: req.url,
      }),
    },
  }));

  app.use(cors({
    origin: config.corsOrigin,
  }));
  // JSON-only API; explicit limit (matches Express default, here for visibility)
  app.use(express.json({ limit: '100kb' }));

  // Routes
  app.use('/api', apiLimiter);
  app.use('/api/plan-route', createPlanRouteRouter(processor));
  app.use('/api/stations', createStationsRouter(stations));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Global error handler (returns JSON instead of HTML for all errors)
  app.use((err: Error & { status?: number; type?: string }, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    // Avoid double-write if headers already sent
    if (res.headersSent) {
      return next(err);
    }

    // Body-parser specific errors
    if (err.type === 'entity.too.large') {
      return res.status(413).json({ error: 'Request body too large' });
    }
    if (err.type === 'entity.parse.failed') {
      return res.status(400).json({ error: 'Invalid JSON' });
    }

    const status = err.status ?? 500;
    const message = status === 500 ? 'Internal server error' : err.message;
    logger.error({ err }, 'Unhandled error');
    return res.status(status).json({ error: message });
  });

  return app;
}
