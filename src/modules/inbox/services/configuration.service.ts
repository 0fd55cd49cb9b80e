import { Injectable, Inject } from '@nestjs/common';
import type { ResolvedInboxConfig } from '../inbox.config';
import { INBOX_CONFIG } from '../constants';
import { redactDatabaseUrl } from '../../../adapters/storage';

/**
 * Configuration Service
 *
 * Provides read access to the inbox configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(INBOX_CONFIG)
    private readonly config: ResolvedInboxConfig,
  ) {}

  /**
   * Check if a webhook secret is configured
   */
  isSecretConfigured(): boolean {
    return this.config.webhookSecret !== undefined;
  }

  /**
   * Database URL with the password hidden
   */
  getRedactedDatabaseUrl(): string {
    return this.config.store ? 'custom' : redactDatabaseUrl(this.config.databaseUrl);
  }

  getBodyLimit(): string {
    return this.config.bodyLimit;
  }
}
