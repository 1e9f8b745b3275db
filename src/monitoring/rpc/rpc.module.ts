import { RPC_PROBE_CLIENT } from '@common/interfaces/rpc.interface';
import { HttpRpcProbeClient } from '@common/utils/rpc-probe-client';
import { ConfigService } from '@config/config.service';
import { MetricsModule } from '@metrics/metrics.module';
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { RpcHealthMonitorService } from './rpc-health.monitor';

@Module({
  imports: [ScheduleModule.forRoot(), MetricsModule],
  providers: [
    {
      provide: RPC_PROBE_CLIENT,
      useFactory: (configService: ConfigService) => {
        const config = configService.getHealthCheckConfig();
        return new HttpRpcProbeClient({
          connectTimeoutMs: config.connectTimeoutMs,
          maxIdleSockets: config.maxIdleSockets,
          idleSocketTimeoutMs: config.idleSocketTimeoutMs,
        });
      },
      inject: [ConfigService],
    },
    RpcHealthMonitorService,
  ],
  exports: [RpcHealthMonitorService],
})
export class RpcModule {}
