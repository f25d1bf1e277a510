// node/src/app.ts — express app wiring; the listener lives in index.ts
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { ServerConfig } from '@/config/accessors';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createQueryRouter } from '@/routes/query';
import type { QueryOrchestrator } from '@/services/orchestrator';

export function createApp(orchestrator: QueryOrchestrator, server: ServerConfig): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: server.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '100kb' }));
  app.use(attachCorrelationId);
  app.use(morgan(server.nodeEnv === 'development' ? 'dev' : 'combined'));

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: server.nodeEnv,
    });
  });

  app.use('/api/recipes/query', createQueryRouter(orchestrator));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
