import { MetricsService } from '@metrics/metrics.service';
import { Controller, Get, Header, Res } from '@nestjs/common';
import type { Response } from 'express';

/**
 * Prometheus scrape endpoint
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  async getMetrics(@Res() response: Response): Promise<void> {
    const metrics = await this.metricsService.getMetrics();
    response.set('Content-Type', this.metricsService.getContentType());
    response.end(metrics);
  }
}
