import { ConfigService, type ConfigServiceOptions } from '@config/config.service';
import { DynamicModule, Global, Module } from '@nestjs/common';

/**
 * Global configuration module providing application configuration services
 */
@Global()
@Module({})
export class ConfigModule {
  static forRoot(options: ConfigServiceOptions = {}): DynamicModule {
    return {
      module: ConfigModule,
      providers: [
        {
          provide: ConfigService,
          useValue: new ConfigService(options),
        },
      ],
      exports: [ConfigService],
    };
  }
}
