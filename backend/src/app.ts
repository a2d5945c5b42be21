import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { config } from './config.js';
import { AppError } from './errors.js';
import { requestLogger, logger } from './middleware/requestLogger.js';
import { healthRouter } from './routes/health.js';
import { authRouter } from './routes/auth.js';
import { usersRouter } from './routes/users.js';
import { jobsRouter } from './routes/jobs.js';
import { workerRouter } from './routes/worker.js';
import { reportsRouter } from './routes/reports.js';
import type { Store } from './services/store.js';
import type { ErrorResponse } from './types/auth.js';

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/** Builds the Express application on top of the given store */
export function createApp(store: Store): Express {
  const app = express();

  // Middleware (order matters)
  app.use(helmet());
  app.use(compression());
  app.use(cors({ origin: '*' }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger);

  // Routes
  app.use('/api', healthRouter(store));
  app.use('/api/auth', authRouter(store));
  app.use('/api/users', usersRouter(store));
  app.use('/api/jobs', jobsRouter(store));
  app.use('/api/worker', workerRouter(store));
  app.use('/api/reports', reportsRouter(store));

  // 404 handler for undefined routes
  app.use((req: Request, res: Response<ErrorResponse>) => {
    res.status(404).json({
      error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
    });
  });

  // Global error handler (must be last)
  app.use((err: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.status).json({ error: { code: err.code, message: err.message } });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
      return;
    }

    logger.error({ err, path: req.path, method: req.method }, 'Unhandled error');
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: config.nodeEnv === 'development' && err instanceof Error ? err.message : 'An unexpected error occurred',
      },
    });
  });

  return app;
}
