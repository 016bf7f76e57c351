import type { MiddlewareHandler } from 'hono';
import type { Logger } from '@chatbridge/core';

/** One line per request; streamed responses are logged when headers go out. */
export function loggingMiddleware(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    const line = `${method} ${path} ${status} ${duration}ms`;
    if (status >= 500) logger.warn(line);
    else logger.info(line);
  };
}
