import type { FastifyInstance } from 'fastify';
import buildServer from '../src/server.js';
import { env } from '../src/util/env.js';

async function main() {
  let app: FastifyInstance | undefined;
  let isShuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (isShuttingDown) {
      return;
    }

    isShuttingDown = true;
    const logger = app?.log;

    logger?.info({ signal }, 'received shutdown signal');

    try {
      if (app) {
        await app.close();
        logger?.info('server stopped');
      }
    } catch (err) {
      logger?.error({ err }, 'error during shutdown');
    } finally {
      process.exit(0);
    }
  };

  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    app = await buildServer();
    const { log } = app;

    await app.listen({ port: env.PORT, host: env.HOST });
    app.isStarted = true;
    log.info({ provider: app.market.provider.name }, 'server started');

    const catalog = await app.market.catalog.get();
    log.info({ size: catalog.size }, 'catalog warmed up');
  } catch (err) {
    if (app) {
      app.log.error({ err }, 'failed to start server');
    } else {
      console.error(err);
    }

    if (!app?.isStarted) {
      process.exit(1);
    }
  }
}

void main();
