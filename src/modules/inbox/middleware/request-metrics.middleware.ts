import { Inject, Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { MetricsRegistry } from '../../../core';
import { METRICS_REGISTRY } from '../constants';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Request Metrics Middleware
 *
 * Assigns a request id, then counts and logs every response once it is
 * sent, including those produced before routing (413, 404).
 *
 * Install with `app.use()` ahead of the body parser; configureApp() does.
 */
@Injectable()
export class RequestMetricsMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  constructor(
    @Inject(METRICS_REGISTRY)
    private readonly metrics: MetricsRegistry,
  ) {}

  use(request: Request, response: Response, next: NextFunction): void {
    const startTime = Date.now();
    const requestId = uuidv4();

    response.locals.requestId = requestId;
    response.setHeader(REQUEST_ID_HEADER, requestId);

    response.once('finish', () => {
      const latencyMs = Date.now() - startTime;
      const path = routeTemplate(request);
      const status = response.statusCode;

      this.metrics.recordRequest(path, status, latencyMs);
      this.logger.log({
        request_id: requestId,
        method: request.method,
        path,
        status,
        latency_ms: latencyMs,
      });
    });

    next();
  }
}

/**
 * Route template of the matched handler (`/messages`, not `/messages?limit=5`);
 * the bare path when nothing matched
 */
function routeTemplate(request: Request): string {
  const route: unknown = request.route;
  if (
    typeof route === 'object' &&
    route !== null &&
    'path' in route &&
    typeof route.path === 'string'
  ) {
    return route.path;
  }
  return request.path;
}
