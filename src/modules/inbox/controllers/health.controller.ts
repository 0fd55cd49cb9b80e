import {
  Controller,
  Get,
  Inject,
  HttpStatus,
  HttpCode,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { MessageStore } from '../../../core';
import { MESSAGE_STORE } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import {
  ApiLivenessCheck,
  ApiReadinessCheck,
  HealthStatusDto,
} from '../../../_shared';

/**
 * Health Controller
 * Liveness and readiness probes for orchestrators
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @Inject(MESSAGE_STORE)
    private readonly store: MessageStore,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get('live')
  @HttpCode(HttpStatus.OK)
  @ApiLivenessCheck()
  live(): HealthStatusDto {
    return { status: 'alive' };
  }

  @Get('ready')
  @HttpCode(HttpStatus.OK)
  @ApiReadinessCheck()
  async ready(): Promise<HealthStatusDto> {
    if (!this.configuration.isSecretConfigured()) {
      throw this.notReady('WEBHOOK_SECRET is not set');
    }

    if (!(await this.store.ping())) {
      this.logger.warn(
        `Storage not ready at ${this.configuration.getRedactedDatabaseUrl()}`,
      );
      throw this.notReady('database not ready');
    }

    return { status: 'ready' };
  }

  private notReady(reason: string): ServiceUnavailableException {
    return new ServiceUnavailableException({ status: 'not ready', reason });
  }
}
