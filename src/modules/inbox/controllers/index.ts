export { WebhookController } from './webhook.controller';
export { MessagesController } from './messages.controller';
export { MetricsController } from './metrics.controller';
export { HealthController } from './health.controller';
