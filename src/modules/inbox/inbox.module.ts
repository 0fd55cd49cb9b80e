import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
  Provider,
} from '@nestjs/common';
import {
  IngestionPipeline,
  MessageStore,
  MetricsRegistry,
} from '../../core';
import { openMessageStore } from '../../adapters/storage';
import {
  InboxModuleConfig,
  InboxModuleAsyncConfig,
  ResolvedInboxConfig,
  createInboxConfig,
} from './inbox.config';
import {
  INBOX_CONFIG,
  INGESTION_PIPELINE,
  MESSAGE_STORE,
  METRICS_REGISTRY,
} from './constants';
import {
  HealthController,
  MessagesController,
  MetricsController,
  WebhookController,
} from './controllers';
import { ConfigurationService } from './services/configuration.service';
import { RequestMetricsMiddleware } from './middleware/request-metrics.middleware';

/**
 * Inbox Module - Main NestJS Module
 *
 * Wires the message store, metrics registry and ingestion pipeline and
 * exposes the webhook, query, metrics and health endpoints
 */
@Global()
@Module({})
export class InboxModule implements OnApplicationShutdown {
  private readonly logger = new Logger(InboxModule.name);

  constructor(
    @Inject(MESSAGE_STORE)
    private readonly store: MessageStore,
  ) {}

  /**
   * Configure the inbox synchronously
   */
  static forRoot(config: InboxModuleConfig = {}): DynamicModule {
    return {
      module: InboxModule,
      providers: [
        {
          provide: INBOX_CONFIG,
          useValue: createInboxConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: this.createControllers(),
      exports: this.createExports(),
    };
  }

  /**
   * Configure the inbox asynchronously
   */
  static forRootAsync(options: InboxModuleAsyncConfig): DynamicModule {
    return {
      module: InboxModule,
      imports: options.imports ?? [],
      providers: [
        {
          provide: INBOX_CONFIG,
          useFactory: async (...args: unknown[]) =>
            createInboxConfig(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        ...this.createProviders(),
      ],
      controllers: this.createControllers(),
      exports: this.createExports(),
    };
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Closing message store${signal ? ` (${signal})` : ''}`);
    await this.store.close();
  }

  /**
   * Providers that only depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: METRICS_REGISTRY,
        useFactory: (config: ResolvedInboxConfig) =>
          new MetricsRegistry(config.latencyBucketsMs),
        inject: [INBOX_CONFIG],
      },
      {
        provide: MESSAGE_STORE,
        useFactory: async (config: ResolvedInboxConfig): Promise<MessageStore> =>
          config.store ??
          openMessageStore(config.databaseUrl, {
            timeoutMs: config.storeTimeoutMs,
            logging: config.sqlLogging,
          }),
        inject: [INBOX_CONFIG],
      },
      {
        provide: INGESTION_PIPELINE,
        useFactory: (
          config: ResolvedInboxConfig,
          store: MessageStore,
          metrics: MetricsRegistry,
        ) =>
          new IngestionPipeline({
            store,
            metrics,
            webhookSecret: config.webhookSecret,
            storeTimeoutMs: config.storeTimeoutMs,
          }),
        inject: [INBOX_CONFIG, MESSAGE_STORE, METRICS_REGISTRY],
      },
      ConfigurationService,
      RequestMetricsMiddleware,
    ];
  }

  private static createControllers() {
    return [
      WebhookController,
      MessagesController,
      MetricsController,
      HealthController,
    ];
  }

  private static createExports() {
    return [
      INBOX_CONFIG,
      MESSAGE_STORE,
      METRICS_REGISTRY,
      INGESTION_PIPELINE,
      ConfigurationService,
      RequestMetricsMiddleware,
    ];
  }
}
