import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';
import type { HealthStatus } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /health
   * Liveness of the checker itself plus a summary of the most recent cycle
   * (null until a cycle has completed)
   */
  @Get()
  getHealth(): HealthStatus {
    return this.healthService.getHealth();
  }
}
