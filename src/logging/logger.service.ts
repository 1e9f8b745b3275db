import { ConfigService } from '@config/config.service';
import { Injectable, LoggerService, LogLevel } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';

type WinstonLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const NEST_TO_WINSTON: Record<LogLevel, WinstonLevel> = {
  fatal: 'error',
  error: 'error',
  warn: 'warn',
  log: 'info',
  verbose: 'verbose',
  debug: 'debug',
};

// Ordered from least to most verbose
const WINSTON_LEVELS: WinstonLevel[] = ['error', 'warn', 'info', 'verbose', 'debug'];

function isWinstonLevel(value: string): value is WinstonLevel {
  return WINSTON_LEVELS.some(level => level === value);
}

@Injectable()
export class CustomLoggerService implements LoggerService {
  private readonly winstonLogger: winston.Logger;
  private readonly logDirectory: string | undefined;
  private readonly context = 'CustomLogger';
  private errorFileTransport: winston.transport | undefined;

  constructor(
    private readonly configService?: ConfigService,
    transports?: winston.transport[],
  ) {
    const configuredLevel = this.configService?.getLogLevel() ?? process.env.LOG_LEVEL ?? 'info';
    const level = isWinstonLevel(configuredLevel) ? configuredLevel : 'info';

    this.logDirectory = this.configService?.getLogDirectory();

    this.winstonLogger = winston.createLogger({
      level,
      transports: transports ?? this.createTransports(level),
      exitOnError: false,
    });

    if (!isWinstonLevel(configuredLevel)) {
      this.warn(`Unknown log level "${configuredLevel}", falling back to info`, this.context);
    }
    this.debug(`Logger initialized with level: ${level}`, this.context);
  }

  private createTransports(level: WinstonLevel): winston.transport[] {
    // Console format with colors
    const consoleFormat = winston.format.combine(
      winston.format.colorize({ all: true }),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, message, context, stack }) => {
        const contextStr = context ? `[${String(context)}] ` : '';
        const stackStr = stack ? `\n${String(stack)}` : '';
        return `${String(timestamp)} ${level} ${contextStr}${String(message)}${stackStr}`;
      }),
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({ level, format: consoleFormat }),
    ];

    if (!this.logDirectory) {
      return transports;
    }

    // logs/YYYY-MM-DD/
    const today = new Date().toISOString().split('T')[0];
    const dailyLogDirectory = path.join(this.logDirectory, today);
    fs.mkdirSync(dailyLogDirectory, { recursive: true });

    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, context, stack }) => {
        const contextStr = context ? `[${String(context)}] ` : '';
        const stackStr = stack ? `\n${String(stack)}` : '';
        return `${String(timestamp)} [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
      }),
    );

    this.errorFileTransport = new winston.transports.File({
      filename: path.join(dailyLogDirectory, 'error.log'),
      level: 'error',
      format: fileFormat,
    });

    return [
      ...transports,
      new winston.transports.File({
        filename: path.join(dailyLogDirectory, 'combined.log'),
        level,
        format: fileFormat,
      }),
      this.errorFileTransport,
    ];
  }

  log(message: unknown, context?: string): void {
    this.write('info', message, context);
  }

  error(message: unknown, stack?: string, context?: string): void {
    if (message instanceof Error) {
      this.write('error', message.message, context, stack ?? message.stack);
    } else {
      this.write('error', message, context, stack);
    }
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.write('verbose', message, context);
  }

  fatal(message: unknown, context?: string): void {
    this.write('error', message, context);
  }

  /**
   * Lowers or raises the threshold to the most verbose of the given levels
   */
  setLogLevels(levels: LogLevel[]): void {
    const indexes = levels.map(level => WINSTON_LEVELS.indexOf(NEST_TO_WINSTON[level]));
    const level = indexes.length ? WINSTON_LEVELS[Math.max(...indexes)] : 'error';

    this.winstonLogger.level = level;
    for (const transport of this.winstonLogger.transports) {
      // error.log stays at error
      if (transport !== this.errorFileTransport) {
        transport.level = level;
      }
    }
  }

  getLevel(): string {
    return this.winstonLogger.level;
  }

  logStartupInfo(bindAddress: string, environment: string, endpoints: number): void {
    this.log('='.repeat(60), this.context);
    this.log('BLOCKCHAIN RPC CHECKER STARTED', this.context);
    this.log('='.repeat(60), this.context);
    this.log(`Listening on: ${bindAddress}`, this.context);
    this.log(`Environment: ${environment}`, this.context);
    this.log(`Endpoints: ${endpoints}`, this.context);
    this.log(`Logs Directory: ${this.logDirectory ?? '(console only)'}`, this.context);
    this.log(`Log Level: ${this.winstonLogger.level}`, this.context);
    this.log(`Started at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  logShutdownInfo(signal: string): void {
    this.log('='.repeat(60), this.context);
    this.log(`BLOCKCHAIN RPC CHECKER SHUTTING DOWN (${signal})`, this.context);
    this.log(`Shutdown at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  private write(level: WinstonLevel, message: unknown, context?: string, stack?: string): void {
    const text = typeof message === 'string' ? message : JSON.stringify(message);
    this.winstonLogger.log({
      level,
      message: text,
      context: context ?? this.context,
      ...(stack ? { stack } : {}),
    });
  }
}
