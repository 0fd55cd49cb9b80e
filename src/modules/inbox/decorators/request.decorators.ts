import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request, Response } from 'express';

/**
 * The request body exactly as received, before any parsing.
 * Requires the raw body parser installed by configureApp().
 */
export const RawBody = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Buffer => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const body: unknown = request.body;
    return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
  },
);

/**
 * Request id assigned by RequestMetricsMiddleware
 */
export const RequestId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string | undefined => {
    const response = ctx.switchToHttp().getResponse<Response>();
    const requestId: unknown = response.locals.requestId;
    return typeof requestId === 'string' ? requestId : undefined;
  },
);
