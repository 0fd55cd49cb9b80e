/**
 * Centralized Swagger decorators for the inbox API
 *
 * These decorators keep API documentation out of the controllers.
 */

export * from './webhook.decorators';
export * from './messages.decorators';
export * from './health.decorators';
