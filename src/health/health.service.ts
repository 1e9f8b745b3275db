import { ConfigService } from '@config/config.service';
import { RpcHealthMonitorService } from '@monitoring/rpc/rpc-health.monitor';
import { Injectable } from '@nestjs/common';
import type { CycleSummary } from '@types';

export interface HealthStatus {
  status: 'ok';
  uptime: number;
  timestamp: string;
  environment: string;
  endpoints: number;
  lastCycle: CycleSummary | null;
}

@Injectable()
export class HealthService {
  private readonly startTime = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly rpcHealthMonitor: RpcHealthMonitorService,
  ) {}

  /**
   * Get the health status of the application
   */
  getHealth(): HealthStatus {
    return {
      status: 'ok',
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: new Date().toISOString(),
      environment: this.configService.getEnvironment(),
      endpoints: this.configService.getEndpoints().length,
      lastCycle: this.rpcHealthMonitor.getLastCycleSummary(),
    };
  }
}
