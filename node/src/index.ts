// Load environment variables FIRST
import 'dotenv/config';

import { createApp } from './app';
import { getServerConfig, loadConfigFromEnv } from '@/config/accessors';
import { initRedisResponseCache } from '@/services/cache';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { createQueryOrchestrator } from '@/services/pipeline-deps';
import { setupGracefulShutdown, setupProcessErrorHandlers } from '@/stability/errorHandlers';

async function startServer(): Promise<void> {
  const server = getServerConfig();
  const core = loadConfigFromEnv();
  const cache = await initRedisResponseCache(server.redisUrl);
  const orchestrator = createQueryOrchestrator(core, server, cache);
  const app = createApp(orchestrator, server);

  setupProcessErrorHandlers(server.nodeEnv);
  const httpServer = app.listen(server.port, '0.0.0.0', () => {
    logger.info('server:listening', { port: server.port, environment: server.nodeEnv });
  });
  setupGracefulShutdown(httpServer);
}

startServer().catch((err: unknown) => {
  logger.fatal('server:start_failed', { err: errorMessage(err) });
  process.exit(1);
});
