import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  EnvironmentVariables,
  InboxModule,
  InboxModuleConfig,
  validateEnvironment,
} from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    InboxModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (
        config: ConfigService<EnvironmentVariables, true>,
      ): InboxModuleConfig => ({
        webhookSecret: config.get('WEBHOOK_SECRET', { infer: true }),
        storage: {
          databaseUrl: config.get('DATABASE_URL', { infer: true }),
        },
        webhooks: {
          storeTimeoutMs: config.get('STORE_TIMEOUT_MS', { infer: true }),
          bodyLimit: config.get('WEBHOOK_BODY_LIMIT', { infer: true }),
        },
      }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
