/**
 * Centralized DTOs for the inbox API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './message.dto';
export * from './stats.dto';
export * from './webhook.dto';
