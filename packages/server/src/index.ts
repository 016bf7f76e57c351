import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { cors } from 'hono/cors';
import { createConsoleLogger, createGateway, type Config, type Gateway, type GatewayOptions, type Logger } from '@chatbridge/core';
import { createChatRoutes } from './routes/chat.js';
import { createModelsRoutes } from './routes/models.js';
import { loggingMiddleware } from './middleware/logging.js';

export interface ServerOptions {
  config: Config;
  /** Prebuilt gateway; built from `config` when absent. */
  gateway?: Gateway;
  /** Passed to `createGateway` when the gateway is built here. */
  gatewayOptions?: GatewayOptions;
  logger?: Logger;
}

export function createApp(options: ServerOptions) {
  const logger = options.logger ?? createConsoleLogger('server');
  const gateway = options.gateway ?? createGateway(options.config, { logger, ...options.gatewayOptions });
  const now = options.gatewayOptions?.now;

  const app = new Hono();

  // Middleware
  app.use('*', cors());
  app.use('*', loggingMiddleware(logger));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // Mount routes
  app.route(
    '/',
    createChatRoutes({
      orchestrator: gateway.orchestrator,
      reasoningFormat: options.config.gateway.reasoningFormat,
      logger,
      now,
    }),
  );
  app.route('/', createModelsRoutes({ registry: gateway.registry, now }));

  app.onError((err, c) => {
    logger.error(`${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ error: { message: err.message, type: 'internal_error', code: null } }, 500);
  });

  return app;
}

export function startServer(options: ServerOptions): ServerType {
  const logger = options.logger ?? createConsoleLogger('server');
  const app = createApp({ ...options, logger });
  const { port, host } = options.config.server;

  logger.info(`Starting chatbridge on http://${host}:${port}`);

  return serve({
    fetch: app.fetch,
    port,
    hostname: host,
  });
}

export { createChatRoutes, ChatRequestSchema, toChatRequest } from './routes/chat.js';
export { createModelsRoutes } from './routes/models.js';
export { loggingMiddleware } from './middleware/logging.js';
export * from './render.js';
