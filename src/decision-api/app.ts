import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter, type ApiDependencies } from './routes/index';

export interface AppOptions {
  clientUrl?: string;
  /** Request logging; off in tests. */
  logRequests?: boolean;
}

export function createApp(deps: ApiDependencies, options: AppOptions = {}): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  if (options.clientUrl) {
    app.use(cors({ origin: options.clientUrl, credentials: true }));
  }
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, createApiRouter(deps));

  app.use(errorHandler);

  return app;
}
