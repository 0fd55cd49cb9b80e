import { v4 as uuidv4 } from 'uuid';
import {
  IngestionContext,
  IngestionResult,
  PipelineConfig,
  PipelineError,
  PipelineStage,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { ValidationStage } from './stages/validation.stage';
import { PersistStage } from './stages/persist.stage';
import { WebhookResult } from '../domain/enums';
import { MetricsRegistry } from '../metrics';
import { SignatureVerifier } from '../signature';
import { PayloadValidator } from '../validation';

/**
 * IngestionPipeline runs one webhook delivery through its stages
 *
 * Pipeline stages:
 * 1. Verification - HMAC over the exact raw bytes
 * 2. Validation - Parse and check the message fields
 * 3. Persist - Idempotent insert keyed by message_id
 *
 * Exactly one webhook result is recorded per call, after the last stage ran.
 */
export class IngestionPipeline {
  private readonly stages: PipelineStage[];
  private readonly metrics: MetricsRegistry;
  private readonly storeTimeoutMs: number;

  constructor(private readonly config: PipelineConfig) {
    this.metrics = config.metrics;
    this.storeTimeoutMs = config.storeTimeoutMs ?? 5000;
    this.stages = this.initializeStages();
  }

  /**
   * Ingest one delivery. Expected failures come back as a result, never thrown.
   */
  async ingest(
    rawBody: Buffer,
    signature?: string | null,
  ): Promise<IngestionResult> {
    const startTime = Date.now();

    const context: IngestionContext = {
      rawBody,
      signature: signature ?? undefined,
      receivedAt: new Date(),
      processingId: uuidv4(),
    };
    const stageDurations: Record<string, number> = {};

    for (const stage of this.stages) {
      const pending = stage.execute(context);
      const stageResult = pending instanceof Promise ? await pending : pending;

      stageDurations[stage.name] = stageResult.durationMs;

      if (!stageResult.shouldContinue) {
        break;
      }
    }

    const result = this.buildResult(
      context,
      Date.now() - startTime,
      stageDurations,
    );
    this.metrics.recordWebhookResult(result.result);

    return result;
  }

  /**
   * Whether a secret was supplied; without one every delivery is rejected
   */
  isSecretConfigured(): boolean {
    return Boolean(this.config.webhookSecret);
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): {
    stages: string[];
    configuration: {
      secretConfigured: boolean;
      storeTimeoutMs: number;
    };
  } {
    return {
      stages: this.stages.map((s) => s.name),
      configuration: {
        secretConfigured: this.isSecretConfigured(),
        storeTimeoutMs: this.storeTimeoutMs,
      },
    };
  }

  private initializeStages(): PipelineStage[] {
    return [
      new VerificationStage(
        this.config.verifier ?? new SignatureVerifier(),
        this.config.webhookSecret,
      ),
      new ValidationStage(this.config.validator ?? new PayloadValidator()),
      new PersistStage(this.config.store, this.storeTimeoutMs),
    ];
  }

  private buildResult(
    context: IngestionContext,
    durationMs: number,
    stageDurations: Record<string, number>,
  ): IngestionResult {
    const base = {
      processingId: context.processingId,
      messageId: context.messageId,
      durationMs,
      stageDurations,
    };

    switch (context.result) {
      case WebhookResult.CREATED:
      case WebhookResult.DUPLICATE:
        if (!context.message) break;
        return {
          ...base,
          result: context.result,
          messageId: context.message.messageId,
        };
      case WebhookResult.INVALID_SIGNATURE:
        return { ...base, result: context.result };
      case WebhookResult.VALIDATION_ERROR:
        if (!context.validationError) break;
        return { ...base, result: context.result, error: context.validationError };
      case WebhookResult.STORAGE_UNAVAILABLE:
        if (!context.storageError) break;
        return { ...base, result: context.result, error: context.storageError };
    }

    throw new PipelineError(
      `Pipeline finished without a consistent result (${context.result ?? 'none'})`,
      'pipeline',
      context,
    );
  }
}
