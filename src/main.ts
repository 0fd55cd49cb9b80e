import 'reflect-metadata';
import { ConsoleLogger, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { toNestLogLevels, validateEnvironment } from './modules';

async function bootstrap() {
  const environment = validateEnvironment(process.env);

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    logger: new ConsoleLogger({
      json: true,
      logLevels: toNestLogLevels(environment.LOG_LEVEL),
    }),
  });

  configureApp(app);
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  const port = environment.PORT;
  await app.listen(port, () => {
    logger.log(`Webhook inbox is running on http://localhost:${port}`);
    logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
  });
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? error.message : String(error),
  );
  process.exit(1);
});
