import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { createLogger, getTimeTakenSincePoint } from '@resolvarr/core';
import type { AppContext } from './context.js';
import {
  createDownloadRouter,
  createResolveRouter,
  createSearchRouter,
  createStatusRouter,
} from './routes/api/index.js';
import { errorMiddleware } from './middlewares/error.js';
import { APIError } from './utils/responses.js';

const logger = createLogger('server');

export function createApp(context: AppContext): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.http(
        `${req.method} ${req.originalUrl} ${res.statusCode} ${getTimeTakenSincePoint(start)}`
      );
    });
    next();
  });

  const apiRouter = express.Router();
  apiRouter.use('/resolve', createResolveRouter(context));
  apiRouter.use('/search', createSearchRouter(context));
  apiRouter.use('/', createDownloadRouter(context));
  apiRouter.use('/status', createStatusRouter(context));
  app.use('/api/v1', apiRouter);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new APIError('NOT_FOUND', 404, `Route ${req.method} ${req.path} not found`));
  });
  app.use(errorMiddleware);

  return app;
}
