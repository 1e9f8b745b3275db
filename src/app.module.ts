import { ConfigModule } from '@config/config.module';
import { HealthModule } from '@health/health.module';
import { LoggingModule } from '@logging/logging.module';
import { MetricsModule } from '@metrics/metrics.module';
import { RpcModule } from '@monitoring/rpc/rpc.module';
import { DynamicModule, Module } from '@nestjs/common';

export interface AppModuleOptions {
  configPath?: string;
}

@Module({})
export class AppModule {
  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ configPath: options.configPath }),
        LoggingModule,
        MetricsModule,
        RpcModule,
        HealthModule,
      ],
    };
  }
}
