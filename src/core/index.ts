/**
 * Webhook inbox core - ingestion logic independent of HTTP and database
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Building blocks
export * from './signature';
export * from './validation';
export * from './metrics';

// Webhook ingestion pipeline
export * from './pipeline';
