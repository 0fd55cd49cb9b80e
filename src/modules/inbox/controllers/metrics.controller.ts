import { Controller, Get, Header, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MetricsRegistry } from '../../../core';
import { ApiMetricsExport } from '../../../_shared';
import { METRICS_REGISTRY } from '../constants';

export const METRICS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

@ApiTags('Observability')
@Controller('metrics')
export class MetricsController {
  constructor(
    @Inject(METRICS_REGISTRY)
    private readonly metrics: MetricsRegistry,
  ) {}

  @Get()
  @Header('Content-Type', METRICS_CONTENT_TYPE)
  @ApiMetricsExport()
  scrape(): string {
    return this.metrics.export();
  }
}
