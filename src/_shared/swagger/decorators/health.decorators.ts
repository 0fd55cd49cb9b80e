import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse } from '@nestjs/swagger';
import { HealthStatusDto } from '../../dto';

/**
 * Swagger decorator for the liveness probe
 */
export const ApiLivenessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Liveness probe',
      description: 'Succeeds while the process is serving requests',
    }),
    ApiResponse({
      status: 200,
      description: 'Process is alive',
      type: HealthStatusDto,
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness probe',
      description:
        'Ready when the webhook secret is configured and storage answers',
    }),
    ApiResponse({
      status: 200,
      description: 'Ready to accept traffic',
      type: HealthStatusDto,
    }),
    ApiResponse({
      status: 503,
      description: 'Not ready; reason says why',
      type: HealthStatusDto,
    }),
  );
};

/**
 * Swagger decorator for the metrics scrape endpoint
 */
export const ApiMetricsExport = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Prometheus metrics',
      description: 'Request counters, webhook outcomes and latency histograms',
    }),
    ApiProduces('text/plain'),
    ApiResponse({
      status: 200,
      description: 'Text exposition format 0.0.4',
    }),
  );
};
