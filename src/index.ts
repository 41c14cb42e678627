import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createAppContext, type AppContext } from './app-context.js';
import { loadConfig } from './lib/config.js';
import { isFitCoachError, ValidationError } from './lib/errors.js';
import logger from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createReviewRoutes } from './routes/reviews.js';
import { createSessionRoutes } from './routes/sessions.js';
import { createWebhookRoutes } from './routes/webhooks.js';

export interface AppState {
  shuttingDown: boolean;
}

export function createApp(ctx: AppContext, state: AppState = { shuttingDown: false }) {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (state.shuttingDown && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const contentLoaded = ctx.content.isLoaded();
    return c.json({
      status: state.shuttingDown ? 'draining' : contentLoaded ? 'ok' : 'degraded',
      content_loaded: contentLoaded,
      corpus_chunks: ctx.content.size,
      session_store: ctx.config.SESSION_STORE,
      delivery_channel: ctx.channel.name,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/reviews', createReviewRoutes(ctx));
  app.route('/api/webhooks', createWebhookRoutes(ctx));
  app.route('/api/sessions', createSessionRoutes(ctx));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, code: err.code, issues: err.issues, request_id: requestId }, 400);
    }
    if (isFitCoachError(err) && err.code === 'STATE_CONFLICT') {
      logger.warn({ err: err.message, requestId }, 'Session conflict');
      return c.json({ error: err.message, code: err.code, request_id: requestId }, 409);
    }
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;

export async function startServer() {
  if (server) return server;

  const config = loadConfig();
  const ctx = await createAppContext(config);
  const state: AppState = { shuttingDown: false };
  const app = createApp(ctx, state);

  const sweeper = setInterval(() => {
    ctx.service
      .expireIdleSessions()
      .then((closed) => {
        if (closed > 0) logger.info({ closed }, 'Closed idle followup sessions');
      })
      .catch((err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Idle session sweep failed');
      });
  }, config.IDLE_SWEEP_INTERVAL_MS);
  sweeper.unref();

  logger.info({ port: config.PORT }, 'Résumé fit coach starting');
  const httpServer = serve({ fetch: app.fetch, port: config.PORT });
  server = httpServer;
  logger.info({ port: config.PORT }, `Server running at http://localhost:${config.PORT}`);

  const shutdown = (signal: string) => {
    if (state.shuttingDown) return;
    state.shuttingDown = true;
    clearInterval(sweeper);
    logger.info({ signal }, 'Graceful shutdown initiated');

    httpServer.close(() => {
      ctx
        .close()
        .catch((err: unknown) => {
          logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown cleanup failed');
        })
        .finally(() => {
          logger.info('HTTP server closed');
          process.exit(0);
        });
    });

    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return httpServer;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
    process.exit(1);
  });
}
