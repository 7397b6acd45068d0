import cors from 'cors';
import express, { Application } from 'express';
import morgan from 'morgan';
import { LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { SessionStore } from './session.js';

export interface AppOptions {
  /** Skip request logging */
  quiet?: boolean;
  sessions?: SessionStore;
}

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, options: AppOptions = {}): Application {
  const { quiet = false, sessions = new SessionStore() } = options;
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  if (!quiet) {
    app.use(morgan('dev'));
  }

  app.use('/api', createApiRoutes(data, sessions));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      scripts: data.scripts.size,
      sessions: sessions.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
