import { HealthController } from '@health/health.controller';
import { HealthService } from '@health/health.service';
import { RpcModule } from '@monitoring/rpc/rpc.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [RpcModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
