import { SCHEDULER } from '@common/constants/config';
import { RPC_PROBE_CLIENT } from '@common/interfaces/rpc.interface';
import type { RpcProbeClient } from '@common/interfaces/rpc.interface';
import { CallError, DecodeError, ErrorHandler, errorMessage, RpcError } from '@common/utils/error-handler';
import { hexToInteger } from '@common/utils/hex';
import { ConfigService } from '@config/config.service';
import { MetricsService } from '@metrics/metrics.service';
import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { CycleReport, CycleSummary, ProbeOutcome, RpcEndpoint } from '@types';

/**
 * Health check engine: probes every configured endpoint once per interval and writes the
 * outcome to the metrics sink.
 *
 * Each endpoint is independent. A failure at any stage sets `rpc_healthy` to 0 and leaves
 * `block_number` alone; a decoded height sets both. Nothing is retried within a cycle.
 */
@Injectable()
export class RpcHealthMonitorService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RpcHealthMonitorService.name);
  private readonly errorHandler = new ErrorHandler(RpcHealthMonitorService.name);
  private lastCycle: CycleReport | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly metricsService: MetricsService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(RPC_PROBE_CLIENT) private readonly probeClient: RpcProbeClient,
  ) {}

  // #region Lifecycle Methods

  onApplicationBootstrap(): void {
    this.startMonitoring();
  }

  onModuleDestroy(): void {
    this.stopMonitoring();
    this.probeClient.close();
  }

  /**
   * Register the interval timer. Ticks that arrive while a cycle is still running start
   * another cycle; missed ticks are not caught up.
   */
  startMonitoring(): void {
    if (this.schedulerRegistry.doesExist('interval', SCHEDULER.RPC_HEALTH_CHECK)) {
      return;
    }

    const { checkOnStartup, intervalMinutes, endpoints, method } = this.configService.getHealthCheckConfig();
    const interval = setInterval(() => {
      void this.runScheduledCycle();
    }, this.configService.checkIntervalMs);
    this.schedulerRegistry.addInterval(SCHEDULER.RPC_HEALTH_CHECK, interval);

    this.logger.log(
      `Checking ${endpoints.length} endpoint(s) with ${method} every ${intervalMinutes} minute(s)` +
        (checkOnStartup ? ', starting now' : ''),
    );

    if (checkOnStartup) {
      void this.runScheduledCycle();
    }
  }

  stopMonitoring(): void {
    if (this.schedulerRegistry.doesExist('interval', SCHEDULER.RPC_HEALTH_CHECK)) {
      this.schedulerRegistry.deleteInterval(SCHEDULER.RPC_HEALTH_CHECK);
      this.logger.log('Stopped RPC health checks');
    }
  }

  // #endregion

  /**
   * Probe every configured endpoint once. A probe that rejects unexpectedly marks only its
   * own endpoint unhealthy.
   */
  async runCycle(): Promise<CycleReport> {
    const { endpoints, concurrency, method } = this.configService.getHealthCheckConfig();
    const startedAt = new Date();
    let outcomes: ProbeOutcome[];

    if (concurrency === 'sequential') {
      outcomes = [];
      for (const endpoint of endpoints) {
        try {
          outcomes.push(await this.checkEndpoint(endpoint));
        } catch (error) {
          outcomes.push(this.markUnhealthy(endpoint, this.toRpcError(error, endpoint, method), startedAt.getTime()));
        }
      }
    } else {
      const settled = await Promise.allSettled(endpoints.map(endpoint => this.checkEndpoint(endpoint)));
      outcomes = settled.map((result, index) =>
        result.status === 'fulfilled'
          ? result.value
          : this.markUnhealthy(
              endpoints[index],
              this.toRpcError(result.reason, endpoints[index], method),
              startedAt.getTime(),
            ),
      );
    }

    const report: CycleReport = { startedAt, finishedAt: new Date(), outcomes };
    this.lastCycle = report;

    const healthy = outcomes.filter(outcome => outcome.status === 'healthy').length;
    this.logger.log(
      `Cycle finished in ${report.finishedAt.getTime() - startedAt.getTime()}ms: ` +
        `${healthy}/${outcomes.length} endpoint(s) healthy`,
    );

    return report;
  }

  /**
   * Probe one endpoint, decode its result and update its gauges
   */
  async checkEndpoint(endpoint: RpcEndpoint): Promise<ProbeOutcome> {
    const { method, probeTimeoutMs } = this.configService.getHealthCheckConfig();
    const startTime = Date.now();

    this.logger.log(`🔍 Checking blockchain RPC endpoint ${endpoint.name} (${endpoint.url}) with method ${method}`);

    let raw: string;
    try {
      raw = await this.probeClient.call(endpoint.url, method, { deadlineMs: probeTimeoutMs });
    } catch (error) {
      return this.markUnhealthy(endpoint, this.toRpcError(error, endpoint, method), startTime);
    }

    this.logger.debug(`📡 Raw result from ${endpoint.name}: ${raw}`);

    let blockHeight: bigint;
    try {
      blockHeight = hexToInteger(raw);
    } catch (error) {
      if (error instanceof DecodeError) {
        return this.markUnhealthy(endpoint, error, startTime);
      }
      throw error;
    }

    this.metricsService.recordProbeSuccess(endpoint.name, Number(blockHeight));
    this.logger.log(`✅ Block number from ${endpoint.name}: ${blockHeight}`);

    return { status: 'healthy', endpoint: endpoint.name, blockHeight, latencyMs: Date.now() - startTime };
  }

  getLastCycle(): CycleReport | null {
    return this.lastCycle;
  }

  getLastCycleSummary(): CycleSummary | null {
    if (!this.lastCycle) return null;

    const { startedAt, finishedAt, outcomes } = this.lastCycle;
    const healthy = outcomes.filter(outcome => outcome.status === 'healthy').length;

    return {
      endpoints: outcomes.length,
      healthy,
      unhealthy: outcomes.length - healthy,
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  }

  private async runScheduledCycle(): Promise<void> {
    try {
      await this.runCycle();
    } catch (error) {
      this.errorHandler.handleError(error, 'RPC health check cycle failed');
    }
  }

  private markUnhealthy(endpoint: RpcEndpoint, error: RpcError | DecodeError, startTime: number): ProbeOutcome {
    this.metricsService.recordProbeFailure(endpoint.name);
    this.errorHandler.handleRpcError(error, endpoint.name, endpoint.url);

    return {
      status: 'unhealthy',
      endpoint: endpoint.name,
      reason: error.reason,
      message: error.message,
      latencyMs: Date.now() - startTime,
    };
  }

  /**
   * Probe clients reject with RpcError; anything else counts as a failed call
   */
  private toRpcError(error: unknown, endpoint: RpcEndpoint, method: string): RpcError {
    if (error instanceof RpcError) return error;
    return new CallError(errorMessage(error), endpoint.url, method);
  }
}
