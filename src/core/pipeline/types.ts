import { InsertOutcome, WebhookResult } from '../domain/enums';
import {
  MessageStore,
  StorageUnavailableError,
  ValidMessage,
} from '../interfaces';
import { MetricsRegistry } from '../metrics';
import { SignatureVerifier } from '../signature';
import { PayloadValidationError, PayloadValidator } from '../validation';

/**
 * Ingestion context passed through the pipeline
 */
export interface IngestionContext {
  // Raw input
  rawBody: Buffer;
  signature?: string;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Verification
  signatureValid?: boolean;

  // Validation
  message?: ValidMessage;
  messageId?: string;
  validationError?: PayloadValidationError;

  // Persistence
  insertOutcome?: InsertOutcome;
  storageError?: StorageUnavailableError;

  // Final outcome, set by the stage that decides it
  result?: WebhookResult;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  context: IngestionContext;
  shouldContinue: boolean;
  durationMs: number;
}

/**
 * Pipeline stage interface. In-memory stages return synchronously.
 */
export interface PipelineStage {
  name: string;
  execute(context: IngestionContext): StageResult | Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  store: MessageStore;
  metrics: MetricsRegistry;

  /**
   * HMAC secret; when absent every request fails verification
   */
  webhookSecret?: string;

  verifier?: SignatureVerifier;
  validator?: PayloadValidator;

  /**
   * Upper bound on the insert, 0 disables the bound
   */
  storeTimeoutMs?: number;
}

interface IngestionResultBase {
  processingId: string;
  messageId?: string;
  durationMs: number;
  stageDurations: Record<string, number>;
}

/**
 * Outcome of one ingestion, tagged by its result code
 */
export type IngestionResult =
  | (IngestionResultBase & {
      result: WebhookResult.CREATED | WebhookResult.DUPLICATE;
      messageId: string;
    })
  | (IngestionResultBase & { result: WebhookResult.INVALID_SIGNATURE })
  | (IngestionResultBase & {
      result: WebhookResult.VALIDATION_ERROR;
      error: PayloadValidationError;
    })
  | (IngestionResultBase & {
      result: WebhookResult.STORAGE_UNAVAILABLE;
      error: StorageUnavailableError;
    });

/**
 * Internal invariant broken while running the pipeline
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public context: IngestionContext,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
