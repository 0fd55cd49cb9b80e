import {
  Controller,
  Post,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  ACCEPTED_WEBHOOK_RESULTS,
  IngestionPipeline,
  IngestionResult,
  WebhookResult,
} from '../../../core';
import { ApiWebhookEndpoint, WebhookAckDto } from '../../../_shared';
import { INGESTION_PIPELINE } from '../constants';
import { RawBody, RequestId } from '../decorators/request.decorators';

const STATUS_BY_RESULT: Record<WebhookResult, number> = {
  [WebhookResult.CREATED]: HttpStatus.OK,
  [WebhookResult.DUPLICATE]: HttpStatus.OK,
  [WebhookResult.INVALID_SIGNATURE]: HttpStatus.UNAUTHORIZED,
  [WebhookResult.VALIDATION_ERROR]: HttpStatus.UNPROCESSABLE_ENTITY,
  [WebhookResult.STORAGE_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Webhook Controller
 *
 * Receives signed inbound messages. The body reaches the pipeline as raw
 * bytes so the signature covers exactly what the sender signed.
 */
@ApiTags('Ingest')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(INGESTION_PIPELINE)
    private readonly pipeline: IngestionPipeline,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiWebhookEndpoint()
  async receive(
    @RawBody() rawBody: Buffer,
    @Headers('x-signature') signature: string | undefined,
    @RequestId() requestId: string | undefined,
  ): Promise<WebhookAckDto> {
    const outcome = await this.pipeline.ingest(rawBody, signature);

    const entry = {
      request_id: requestId,
      message_id: outcome.messageId ?? null,
      dup: outcome.result === WebhookResult.DUPLICATE,
      result: outcome.result,
      status: STATUS_BY_RESULT[outcome.result],
      latency_ms: outcome.durationMs,
    };
    if (ACCEPTED_WEBHOOK_RESULTS.has(outcome.result)) {
      this.logger.log(entry);
    } else {
      this.logger.warn(entry);
    }

    return this.formatResponse(outcome);
  }

  private formatResponse(outcome: IngestionResult): WebhookAckDto {
    switch (outcome.result) {
      case WebhookResult.CREATED:
      case WebhookResult.DUPLICATE:
        return { status: 'ok' };

      case WebhookResult.INVALID_SIGNATURE:
        throw new UnauthorizedException('invalid signature');

      case WebhookResult.VALIDATION_ERROR:
        throw new UnprocessableEntityException({
          statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
          message: 'validation failed',
          field: outcome.error.field,
          reason: outcome.error.reason,
        });

      case WebhookResult.STORAGE_UNAVAILABLE:
        throw new ServiceUnavailableException('storage unavailable');
    }
  }
}
