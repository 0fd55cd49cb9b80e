/**
 * Webhook Inbox
 *
 * Signed webhook ingestion with exactly-once storage, message queries,
 * statistics and Prometheus metrics.
 */

// Export all core components
export * from './core';

// Export testing utilities from _shared
export {
  SignedMessageFactory,
  SIGNATURE_HEADER,
  DEFAULT_TEST_SECRET,
} from './_shared/testing/signed-message.factory';
export type {
  MessageOptions,
  SignedMessage,
} from './_shared/testing/signed-message.factory';

// Export storage adapters
export * from './adapters/storage';

// Export NestJS module, controllers, tokens and configuration
export * from './modules';

// Export application setup
export { configureApp, AppSetupOptions } from './app.setup';
