import 'reflect-metadata';

import { AppModule } from '@/app.module';
import { USAGE } from '@common/constants/config';
import { parseCliArgs } from '@common/utils/cli-args';
import { AppError, ConfigurationError, UsageError, errorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { NestFactory } from '@nestjs/core';
import type { BindAddress } from '@types';

process.on('unhandledRejection', reason => {
  console.error('Unhandled Rejection:', reason);
});

function formatBindAddress({ host, port }: BindAddress): string {
  if (host === undefined) {
    return `:${port}`;
  }
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

async function bootstrap(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const app = await NestFactory.create(AppModule.forRoot({ configPath: args.configPath }), {
    bufferLogs: true,
  });

  const customLogger = app.get(CustomLoggerService);
  app.useLogger(customLogger);

  const configService = app.get(ConfigService);
  const bindAddress = configService.getMetricsAddress();

  // Scheduling starts in onApplicationBootstrap, which runs inside listen()
  if (bindAddress.host === undefined) {
    await app.listen(bindAddress.port);
  } else {
    await app.listen(bindAddress.port, bindAddress.host);
  }

  customLogger.logStartupInfo(
    formatBindAddress(bindAddress),
    configService.getEnvironment(),
    configService.getEndpoints().length,
  );
  customLogger.log(`Configuration loaded from ${configService.configPath ?? '(inline)'}`, 'Bootstrap');
  customLogger.log('Prometheus metrics available at /metrics', 'Bootstrap');

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    customLogger.logShutdownInfo(signal);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        customLogger.error(`Error during shutdown: ${errorMessage(error)}`, undefined, 'Bootstrap');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

bootstrap().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(`${error.message}\n\n${USAGE}`);
  } else if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
  } else if (error instanceof AppError) {
    console.error(`Failed to start application: ${error.toString()}`);
  } else {
    console.error('Failed to start application:', error);
  }
  process.exit(1);
});
