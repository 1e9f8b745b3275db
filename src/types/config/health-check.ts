import type { RpcEndpoint } from '../rpc/endpoint';

export type ProbeConcurrency = 'parallel' | 'sequential';

export interface BindAddress {
  // Absent: every interface, IPv4 and IPv6
  host?: string;
  port: number;
}

/**
 * Validated contents of the YAML configuration file
 */
export interface HealthCheckConfig {
  endpoints: RpcEndpoint[];
  intervalMinutes: number;
  method: string;
  metricsAddress: BindAddress;
  probeTimeoutMs: number;
  connectTimeoutMs: number;
  maxIdleSockets: number;
  idleSocketTimeoutMs: number;
  checkOnStartup: boolean;
  concurrency: ProbeConcurrency;
}
