/**
 * Webhook ingestion pipeline
 *
 * 1. Verification - Validate the HMAC signature over the raw body
 * 2. Validation - Parse and check the message
 * 3. Persist - Idempotent insert
 */

// Main pipeline
export { IngestionPipeline } from './ingestion-pipeline';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { VerificationStage } from './stages/verification.stage';
export { ValidationStage } from './stages/validation.stage';
export { PersistStage } from './stages/persist.stage';
