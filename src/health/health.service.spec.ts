import { SchedulerRegistry } from '@nestjs/schedule';
import { describe, expect, it, vi } from 'vitest';

import { ScriptedRpcProbeClient } from '@common/utils/scripted-rpc-probe-client';
import { ConfigService } from '@config/config.service';
import { MetricsService } from '@metrics/metrics.service';
import { RpcHealthMonitorService } from '@monitoring/rpc/rpc-health.monitor';
import type { HealthCheckConfig } from '@types';
import { HealthService } from './health.service';

const CONFIG: HealthCheckConfig = {
  endpoints: [{ name: 'mainnet', url: 'http://mainnet.test:8545' }],
  intervalMinutes: 5,
  method: 'eth_blockNumber',
  metricsAddress: { host: '0.0.0.0', port: 8080 },
  probeTimeoutMs: 30000,
  connectTimeoutMs: 10000,
  maxIdleSockets: 100,
  idleSocketTimeoutMs: 90000,
  checkOnStartup: false,
  concurrency: 'parallel',
};

describe('HealthService', (): void => {
  const setup = (overrides: Partial<HealthCheckConfig> = {}) => {
    const configService = new ConfigService({
      config: { ...CONFIG, ...overrides },
      env: { NODE_ENV: 'test' },
      envFilePath: null,
    });
    const client = new ScriptedRpcProbeClient().respond('http://mainnet.test:8545', { kind: 'result', value: '0xa' });
    const monitor = new RpcHealthMonitorService(configService, new MetricsService(), new SchedulerRegistry(), client);
    return { monitor, service: new HealthService(configService, monitor) };
  };

  it('reports no cycle before the first interval', (): void => {
    const { service } = setup();

    const health = service.getHealth();

    expect(health).toMatchObject({ status: 'ok', environment: 'test', endpoints: 1, lastCycle: null });
    expect(health.uptime).toBeGreaterThanOrEqual(0);
  });

  it('summarises the most recent cycle', async (): Promise<void> => {
    const { monitor, service } = setup();

    await monitor.runCycle();

    expect(service.getHealth().lastCycle).toMatchObject({ endpoints: 1, healthy: 1, unhealthy: 0 });
  });

  it('reports the startup cycle before the first interval when checking on startup', async (): Promise<void> => {
    const { monitor, service } = setup({ checkOnStartup: true });

    monitor.startMonitoring();
    try {
      await vi.waitFor((): void => {
        expect(service.getHealth().lastCycle).toMatchObject({ endpoints: 1, healthy: 1 });
      });
    } finally {
      monitor.stopMonitoring();
    }
  });
});
