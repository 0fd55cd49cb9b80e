import { Logger } from '@nestjs/common';
import {
  PipelineStage,
  IngestionContext,
  StageResult,
  PipelineError,
} from '../types';
import { InsertOutcome, WebhookResult } from '../../domain/enums';
import {
  MessageStore,
  StorageUnavailableError,
  ValidMessage,
} from '../../interfaces';

/**
 * Stage 3: Persist
 * Idempotent insert; the store's unique constraint decides created vs duplicate
 */
export class PersistStage implements PipelineStage {
  name = 'persist';
  private readonly logger = new Logger(PersistStage.name);

  constructor(
    private readonly store: MessageStore,
    private readonly timeoutMs = 5000,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const startTime = Date.now();
    const message = context.message;

    if (!message) {
      throw new PipelineError(
        'Persist stage reached without a validated message',
        this.name,
        context,
      );
    }

    try {
      context.insertOutcome = await this.insertWithTimeout(message);
      context.result =
        context.insertOutcome === InsertOutcome.CREATED
          ? WebhookResult.CREATED
          : WebhookResult.DUPLICATE;

      return {
        context,
        shouldContinue: true,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      context.storageError =
        error instanceof StorageUnavailableError
          ? error
          : new StorageUnavailableError(
              `Insert failed: ${error instanceof Error ? error.message : String(error)}`,
              'insert',
              error,
            );
      context.result = WebhookResult.STORAGE_UNAVAILABLE;

      this.logger.error(
        `Storing message ${message.messageId} failed: ${context.storageError.message}`,
      );

      return {
        context,
        shouldContinue: false,
        durationMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Race the insert against the timeout. On expiry the write is not
   * cancelled; a late finish is only logged.
   */
  private async insertWithTimeout(message: ValidMessage): Promise<InsertOutcome> {
    const write = this.store.insert(message);
    if (this.timeoutMs <= 0) {
      return write;
    }

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(
          new StorageUnavailableError(
            `Insert timed out after ${this.timeoutMs}ms`,
            'insert',
          ),
        );
      }, this.timeoutMs);
    });

    void write.then(
      (outcome) => {
        if (timedOut) {
          this.logger.warn(
            `Insert of ${message.messageId} finished after timeout: ${outcome}`,
          );
        }
      },
      (error: unknown) => {
        if (timedOut) {
          this.logger.warn(
            `Insert of ${message.messageId} failed after timeout: ${String(error)}`,
          );
        }
      },
    );

    try {
      return await Promise.race([write, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
