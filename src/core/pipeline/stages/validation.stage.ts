import { PipelineStage, IngestionContext, StageResult } from '../types';
import { WebhookResult } from '../../domain/enums';
import { PayloadValidator } from '../../validation';

/**
 * Stage 2: Validation
 * Parses the authenticated body into a typed message
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  constructor(private readonly validator: PayloadValidator) {}

  execute(context: IngestionContext): StageResult {
    const startTime = Date.now();
    const outcome = this.validator.validate(context.rawBody);

    if (outcome.ok) {
      context.message = outcome.value;
      context.messageId = outcome.value.messageId;
    } else {
      context.validationError = outcome.error;
      context.messageId = outcome.messageId;
      context.result = WebhookResult.VALIDATION_ERROR;
    }

    return {
      context,
      shouldContinue: outcome.ok,
      durationMs: Date.now() - startTime,
    };
  }
}
