import { PipelineStage, IngestionContext, StageResult } from '../types';
import { WebhookResult } from '../../domain/enums';
import { SignatureVerifier } from '../../signature';

/**
 * Stage 1: Signature Verification
 * Authenticates the exact bytes received before anything reads them
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(
    private readonly verifier: SignatureVerifier,
    private readonly secret: string | undefined,
  ) {}

  execute(context: IngestionContext): StageResult {
    const startTime = Date.now();

    context.signatureValid = this.verifier.verify(
      context.rawBody,
      context.signature,
      this.secret,
    );

    if (!context.signatureValid) {
      context.result = WebhookResult.INVALID_SIGNATURE;
    }

    return {
      context,
      shouldContinue: context.signatureValid,
      durationMs: Date.now() - startTime,
    };
  }
}
