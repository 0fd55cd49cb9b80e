import { HttpStatus, ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import { ConfigurationService, RequestMetricsMiddleware } from './modules';

export interface AppSetupOptions {
  /**
   * Overrides the configured webhook body limit
   */
  bodyLimit?: string;
  swagger?: boolean;
}

/**
 * Apply body parsing, validation and docs to an application created with
 * `bodyParser: false`
 */
export function configureApp(
  app: NestExpressApplication,
  options: AppSetupOptions = {},
): NestExpressApplication {
  const limit =
    options.bodyLimit ?? app.get(ConfigurationService).getBodyLimit();

  // Ahead of the body parser so rejected bodies are counted too
  const requestMetrics = app.get(RequestMetricsMiddleware);
  app.use((request: Request, response: Response, next: NextFunction) =>
    requestMetrics.use(request, response, next),
  );

  // Raw bytes only: the webhook signature covers the body exactly as sent
  app.useBodyParser('raw', { type: () => true, limit });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    }),
  );

  if (options.swagger !== false) {
    const config = new DocumentBuilder()
      .setTitle('Webhook Inbox')
      .setDescription(
        'Ingests HMAC-signed messages exactly once and serves them back with filters and statistics.',
      )
      .setVersion('0.1.0')
      .addTag('Ingest', 'Receive signed inbound messages')
      .addTag('Query', 'Stored messages and statistics')
      .addTag('Observability', 'Prometheus metrics')
      .addTag('Health', 'Liveness and readiness probes')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api', app, document);
  }

  return app;
}
