import * as fs from 'fs';
import * as os from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '@common/utils/error-handler';
import { ConfigService } from './config.service';

const CONFIG_YAML = `endpoints:
  - name: mainnet
    url: https://rpc.example.org
interval: 2
method: eth_blockNumber
prometheus:
  address: 127.0.0.1:9100
`;

describe('ConfigService', (): void => {
  let dir: string;
  let configPath: string;

  beforeEach((): void => {
    dir = fs.mkdtempSync(join(os.tmpdir(), 'rpc-checker-config-'));
    configPath = join(dir, 'config.yaml');
    fs.writeFileSync(configPath, CONFIG_YAML);
  });

  afterEach((): void => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads and validates the configuration file', (): void => {
    const service = new ConfigService({ configPath, env: {}, envFilePath: null });

    expect(service.configPath).toBe(configPath);
    expect(service.getEndpoints()).toEqual([{ name: 'mainnet', url: 'https://rpc.example.org' }]);
    expect(service.getMethod()).toBe('eth_blockNumber');
    expect(service.getMetricsAddress()).toEqual({ host: '127.0.0.1', port: 9100 });
    expect(service.checkIntervalMs).toBe(120000);
  });

  it('takes the file path from CONFIG_FILE when none is given', (): void => {
    const service = new ConfigService({ env: { CONFIG_FILE: configPath }, envFilePath: null });
    expect(service.configPath).toBe(configPath);
  });

  it('rejects a missing configuration file', (): void => {
    let caught: unknown;
    try {
      new ConfigService({ configPath: join(dir, 'missing.yaml'), env: {}, envFilePath: null });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.configKey).toBe('config');
      expect(caught.message).toContain('Error reading config file');
    }
  });

  it('rejects an invalid configuration file with the offending key', (): void => {
    fs.writeFileSync(configPath, CONFIG_YAML.replace('interval: 2', 'interval: 0'));

    let caught: unknown;
    try {
      new ConfigService({ configPath, env: {}, envFilePath: null });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.configKey).toBe('interval');
    }
  });

  it('merges a .env file over the environment', (): void => {
    const envFilePath = join(dir, '.env');
    fs.writeFileSync(envFilePath, 'LOG_LEVEL=debug\nLOG_DIR=/var/log/rpc-checker\n');

    const service = new ConfigService({ configPath, env: { LOG_LEVEL: 'warn', NODE_ENV: 'test' }, envFilePath });

    expect(service.getLogLevel()).toBe('debug');
    expect(service.getLogDirectory()).toBe('/var/log/rpc-checker');
    expect(service.getEnvironment()).toBe('test');
  });

  it('falls back to defaults for unset variables', (): void => {
    const service = new ConfigService({ configPath, env: { LOG_DIR: '' }, envFilePath: null });

    expect(service.getLogLevel()).toBe('info');
    expect(service.getLogDirectory()).toBeUndefined();
    expect(service.getEnvironment()).toBe('production');
    expect(service.isDefaultMetricsEnabled()).toBe(true);
  });

  it('parses boolean variables', (): void => {
    const service = new ConfigService({
      configPath,
      env: { ENABLE_DEFAULT_METRICS: '0', BROKEN_FLAG: 'maybe' },
      envFilePath: null,
    });

    expect(service.isDefaultMetricsEnabled()).toBe(false);
    expect((): boolean => service.getBoolean('BROKEN_FLAG')).toThrow(
      'Failed to transform environment variable BROKEN_FLAG: Cannot convert "maybe" to a boolean',
    );
  });

  it('uses a preloaded configuration without touching the filesystem', (): void => {
    const config = new ConfigService({ configPath, env: {}, envFilePath: null }).getHealthCheckConfig();
    const service = new ConfigService({ config, env: {}, envFilePath: null });

    expect(service.configPath).toBeNull();
    expect(service.getHealthCheckConfig()).toBe(config);
  });
});
