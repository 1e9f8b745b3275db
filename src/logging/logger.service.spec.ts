import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';
import { describe, expect, it } from 'vitest';
import * as winston from 'winston';

import { ConfigService } from '@config/config.service';
import type { HealthCheckConfig } from '@types';
import { CustomLoggerService } from './logger.service';

const CONFIG: HealthCheckConfig = {
  endpoints: [{ name: 'local', url: 'http://127.0.0.1:8545' }],
  intervalMinutes: 1,
  method: 'eth_blockNumber',
  metricsAddress: { host: '0.0.0.0', port: 8080 },
  probeTimeoutMs: 30000,
  connectTimeoutMs: 10000,
  maxIdleSockets: 100,
  idleSocketTimeoutMs: 90000,
  checkOnStartup: false,
  concurrency: 'parallel',
};

interface CapturedEntry {
  level: string;
  message: string;
  context: string;
  stack?: string;
}

function capture(level?: string): { transport: winston.transport; entries: CapturedEntry[] } {
  const entries: CapturedEntry[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback): void {
      entries.push(JSON.parse(chunk.toString()));
      callback();
    },
  });
  return { transport: new winston.transports.Stream({ stream, level }), entries };
}

function configWith(env: Record<string, string>): ConfigService {
  return new ConfigService({ config: CONFIG, env, envFilePath: null });
}

describe('CustomLoggerService', (): void => {
  it('writes messages with their context', (): void => {
    const { transport, entries } = capture();
    const logger = new CustomLoggerService(configWith({}), [transport]);

    logger.log('Cycle complete', 'RpcHealthMonitorService');

    expect(entries).toEqual([{ level: 'info', message: 'Cycle complete', context: 'RpcHealthMonitorService' }]);
  });

  it('keeps the stack of logged errors', (): void => {
    const { transport, entries } = capture();
    const logger = new CustomLoggerService(configWith({}), [transport]);

    logger.error(new Error('boom'), undefined, 'Bootstrap');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'error', message: 'boom', context: 'Bootstrap' });
    expect(entries[0].stack).toContain('Error: boom');
  });

  it('filters below the configured level', (): void => {
    const { transport, entries } = capture();
    const logger = new CustomLoggerService(configWith({ LOG_LEVEL: 'warn' }), [transport]);

    logger.log('hidden');
    logger.warn('shown');

    expect(entries.map(entry => entry.message)).toEqual(['shown']);
  });

  it('applies log levels set at runtime', (): void => {
    const { transport, entries } = capture();
    const logger = new CustomLoggerService(configWith({}), [transport]);

    logger.setLogLevels(['error', 'warn', 'log', 'debug']);
    logger.debug('raw result', 'RpcHealthMonitorService');

    expect(logger.getLevel()).toBe('debug');
    expect(entries.map(entry => entry.message)).toEqual(['raw result']);
  });

  it('raises a transport that started at error level', (): void => {
    const { transport, entries } = capture('error');
    const logger = new CustomLoggerService(configWith({ LOG_LEVEL: 'error' }), [transport]);

    logger.log('hidden');
    logger.setLogLevels(['error', 'warn', 'log']);
    logger.log('shown');

    expect(entries.map(entry => entry.message)).toEqual(['shown']);
  });

  it('serialises non-string messages', (): void => {
    const { transport, entries } = capture();
    const logger = new CustomLoggerService(configWith({}), [transport]);

    logger.log({ endpoint: 'local', healthy: true });

    expect(entries[0].message).toBe('{"endpoint":"local","healthy":true}');
    expect(entries[0].context).toBe('CustomLogger');
  });

  it('creates a daily log directory when LOG_DIR is set', (): void => {
    const logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpc-checker-logs-'));

    new CustomLoggerService(configWith({ LOG_DIR: logDir }));

    const today = new Date().toISOString().split('T')[0];
    expect(fs.existsSync(path.join(logDir, today))).toBe(true);
  });
});
