import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import {
  DEFAULT_LATENCY_BUCKETS_MS,
  MessageStore,
} from '../../core';
import { DEFAULT_DATABASE_URL } from '../../adapters/storage';

/**
 * Inbox Module Configuration
 */
export interface InboxModuleConfig {
  /**
   * HMAC-SHA256 secret shared with the sender.
   * When unset every webhook is rejected and readiness fails.
   */
  webhookSecret?: string;

  /**
   * Storage configuration
   */
  storage?: {
    /**
     * `postgres://…`, `sqlite:////abs/path.db`, `sqlite:///rel/path.db`
     * or `memory://`
     */
    databaseUrl?: string;

    /**
     * Ready-made store; takes precedence over databaseUrl
     */
    store?: MessageStore;

    /**
     * Log SQL statements
     */
    logging?: boolean;
  };

  /**
   * Webhook processing configuration
   */
  webhooks?: {
    /**
     * Upper bound on one insert, also used for driver timeouts
     */
    storeTimeoutMs?: number;

    /**
     * Largest accepted raw body, in body-parser notation
     */
    bodyLimit?: string;
  };

  /**
   * Metrics configuration
   */
  metrics?: {
    latencyBucketsMs?: number[];
  };
}

/**
 * Async configuration factory
 */
export interface InboxModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    InboxModuleConfig | Promise<InboxModuleConfig>
  >['useFactory'];
}

/**
 * Configuration after defaults are applied; frozen once built
 */
export interface ResolvedInboxConfig {
  readonly webhookSecret?: string;
  readonly databaseUrl: string;
  readonly store?: MessageStore;
  readonly sqlLogging: boolean;
  readonly storeTimeoutMs: number;
  readonly bodyLimit: string;
  readonly latencyBucketsMs: readonly number[];
}

/**
 * Default configuration values
 */
export const defaultInboxConfig = {
  databaseUrl: DEFAULT_DATABASE_URL,
  storeTimeoutMs: 5000,
  bodyLimit: '1mb',
  latencyBucketsMs: DEFAULT_LATENCY_BUCKETS_MS,
} as const;

/**
 * Merge a module configuration with defaults and freeze it
 */
export function createInboxConfig(
  config: InboxModuleConfig = {},
): ResolvedInboxConfig {
  const secret = config.webhookSecret;

  return Object.freeze({
    webhookSecret: secret && secret.length > 0 ? secret : undefined,
    databaseUrl: config.storage?.databaseUrl ?? defaultInboxConfig.databaseUrl,
    store: config.storage?.store,
    sqlLogging: config.storage?.logging ?? false,
    storeTimeoutMs:
      config.webhooks?.storeTimeoutMs ?? defaultInboxConfig.storeTimeoutMs,
    bodyLimit: config.webhooks?.bodyLimit ?? defaultInboxConfig.bodyLimit,
    latencyBucketsMs: Object.freeze([
      ...(config.metrics?.latencyBucketsMs ??
        defaultInboxConfig.latencyBucketsMs),
    ]),
  });
}
