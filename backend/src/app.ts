import compression from 'compression';
import cors from 'cors';
import express from 'express';
import { ForumStore } from './database/types.js';
import { JobQueue } from './jobs/types.js';
import { authenticateToken, requireForumUser } from './middleware/auth.js';
import { forumRouter } from './routes/forum.js';
import { Clock, RandomSource } from './utils/clock.js';
import { Logger } from './utils/logger.js';

export interface AppDeps {
  store: ForumStore;
  queue: JobQueue;
  clock: Clock;
  random: RandomSource;
  jwtSecret: string;
  frontendUrl: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Compress responses larger than 1KB
  app.use(compression({ threshold: 1024 }));
  app.use(cors({
    origin: deps.frontendUrl,
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req, _res, next) => {
    Logger.http(`[HTTP] ${req.method} ${req.originalUrl}`);
    next();
  });

  // Routes
  app.use(
    '/api/forum',
    authenticateToken(deps.jwtSecret),
    requireForumUser(deps.store),
    forumRouter(deps)
  );

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: deps.clock.now().toISOString() });
  });

  return app;
}
