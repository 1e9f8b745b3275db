import { METRICS } from '@common/constants/config';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger } from '@nestjs/common';
import { collectDefaultMetrics, Gauge, Registry } from 'prom-client';

/**
 * Gauge series written by the health check engine
 */
export type GaugeSeries = 'rpc_healthy' | 'block_number';

type EndpointLabel = typeof METRICS.ENDPOINT_LABEL;

/**
 * Prometheus metrics sink.
 *
 * Owns the process-wide registry and the two endpoint gauges. Writes are synchronous, so a
 * scrape never sees half of a success write.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);
  private readonly registry: Registry;
  private readonly gauges: Record<GaugeSeries, Gauge<EndpointLabel>>;

  constructor(configService?: ConfigService) {
    this.registry = new Registry();

    if (configService?.isDefaultMetricsEnabled()) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.gauges = {
      rpc_healthy: new Gauge({
        name: METRICS.RPC_HEALTHY.NAME,
        help: METRICS.RPC_HEALTHY.HELP,
        labelNames: [METRICS.ENDPOINT_LABEL],
        registers: [this.registry],
      }),
      block_number: new Gauge({
        name: METRICS.BLOCK_NUMBER.NAME,
        help: METRICS.BLOCK_NUMBER.HELP,
        labelNames: [METRICS.ENDPOINT_LABEL],
        registers: [this.registry],
      }),
    };
  }

  /**
   * Overwrite one labelled gauge value
   */
  setGauge(series: GaugeSeries, label: string, value: number): void {
    this.gauges[series].set({ [METRICS.ENDPOINT_LABEL]: label }, value);
  }

  /**
   * Mark an endpoint healthy together with the height it reported
   */
  recordProbeSuccess(endpoint: string, blockNumber: number): void {
    this.setGauge('rpc_healthy', endpoint, 1);
    this.setGauge('block_number', endpoint, blockNumber);
  }

  /**
   * Mark an endpoint unhealthy; its last block number stays as it was
   */
  recordProbeFailure(endpoint: string): void {
    this.setGauge('rpc_healthy', endpoint, 0);
  }

  /**
   * Read back a gauge value, undefined when the label was never written
   */
  async getGaugeValue(series: GaugeSeries, label: string): Promise<number | undefined> {
    const metric = await this.gauges[series].get();
    return metric.values.find(sample => sample.labels[METRICS.ENDPOINT_LABEL] === label)?.value;
  }

  async getMetrics(): Promise<string> {
    this.logger.verbose('Serializing metrics registry');
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}
