import { ConfigService } from '@config/config.service';
import { Global, Module } from '@nestjs/common';
import { CustomLoggerService } from './logger.service';

@Global()
@Module({
  providers: [
    {
      provide: CustomLoggerService,
      useFactory: (configService: ConfigService) => new CustomLoggerService(configService),
      inject: [ConfigService],
    },
  ],
  exports: [CustomLoggerService],
})
export class LoggingModule {}
