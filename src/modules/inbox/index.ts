/**
 * Inbox NestJS Module
 *
 * Main module for serving the webhook inbox from a NestJS application
 */

// Main module
export { InboxModule } from './inbox.module';

// Configuration
export {
  InboxModuleConfig,
  InboxModuleAsyncConfig,
  ResolvedInboxConfig,
  createInboxConfig,
  defaultInboxConfig,
} from './inbox.config';
export * from './environment';

// Injection tokens
export * from './constants';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';

// Decorators
export { RawBody, RequestId } from './decorators/request.decorators';

// Middleware
export {
  RequestMetricsMiddleware,
  REQUEST_ID_HEADER,
} from './middleware/request-metrics.middleware';
