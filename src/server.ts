import Fastify, { type FastifyInstance } from 'fastify';
import pino from 'pino';
import rateLimit from '@fastify/rate-limit';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { RATE_LIMITS } from './rate-limit.js';
import { env } from './util/env.js';
import { errorResponse } from './util/error-messages.js';
import {
  createMarketServices,
  type MarketServices,
} from './services/market-services.js';

declare module 'fastify' {
  interface FastifyInstance {
    /** Indicates whether the HTTP server finished booting */
    isStarted: boolean;
    market: MarketServices;
  }
}

export interface BuildServerOptions {
  routesDir?: string;
  /** build the market services from the app logger; defaults to env config */
  market?: (app: FastifyInstance) => MarketServices;
}

const DEFAULT_ROUTES_DIR = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  'routes',
);

type RoutePlugin = (app: FastifyInstance) => Promise<void>;

function isFastifyPlugin(value: unknown): value is RoutePlugin {
  return typeof value === 'function';
}

async function loadRoutePlugin(
  app: FastifyInstance,
  routesDir: string,
  file: string,
): Promise<RoutePlugin> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(path.join(routesDir, file)).href);
  } catch (err) {
    app.log.error({ err, file }, 'failed to load route module');
    throw err instanceof Error ? err : new Error(String(err));
  }

  const plugin =
    typeof mod === 'function'
      ? mod
      : mod && typeof mod === 'object' && 'default' in mod
        ? mod.default
        : undefined;
  if (!isFastifyPlugin(plugin)) {
    const available = mod && typeof mod === 'object' ? Object.keys(mod) : [];
    app.log.error({ file, exports: available }, 'route module must export a Fastify plugin');
    throw new Error(`Route ${file} does not export a Fastify plugin.`);
  }
  return plugin;
}

export default async function buildServer(
  opts: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const routesDir = opts.routesDir ?? DEFAULT_ROUTES_DIR;
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
    },
    disableRequestLogging: true,
  });

  app.decorate('isStarted', false);
  app.decorate(
    'market',
    opts.market ? opts.market(app) : createMarketServices(env, app.log),
  );

  await app.register(rateLimit, {
    global: false,
    ...RATE_LIMITS.LAX,
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      ...errorResponse(`Too many requests, please try again in ${context.after}.`),
    }),
  });

  for (const file of fs.readdirSync(routesDir)) {
    if (fs.statSync(path.join(routesDir, file)).isDirectory()) continue;

    const isScript = /\.([tj])s$/.test(file);
    const isTypes = /\.d\.([tj])s$/.test(file) || /\.types\.([tj])s$/.test(file);
    const isTest = /\.(spec|test)\.([tj])s$/.test(file);
    if (!isScript || isTypes || isTest) continue;

    const plugin = await loadRoutePlugin(app, routesDir, file);

    try {
      await app.register(plugin, { prefix: '/api' });
    } catch (err) {
      app.log.error({ err, file }, 'failed to register route module');
      throw err instanceof Error ? err : new Error(String(err));
    }
  }

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions.url || req.raw.url;
    if (reply.statusCode < 400) {
      req.log.info({ route, statusCode: reply.statusCode }, 'request success');
    } else {
      req.log.warn({ route, statusCode: reply.statusCode }, 'request failed');
    }
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err, url: req.raw.url }, 'request error');
    const statusCode =
      typeof err.statusCode === 'number' && err.statusCode >= 400 ? err.statusCode : 500;
    reply.code(statusCode).send(errorResponse(statusCode >= 500 ? 'internal error' : err.message));
  });

  app.log.info('Server initialized');
  return app;
}
