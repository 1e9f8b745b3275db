/**
 * Probe types shared by the probe client and the health check engine
 */

/**
 * Stage at which a probe failed
 * - connect: the connection or TLS handshake could not be established
 * - call: the remote call errored, returned an unusable result, or the deadline elapsed
 * - decode: the result was not a well-formed hexadecimal quantity
 */
export type ProbeFailureReason = 'connect' | 'call' | 'decode';

export interface ProbeCallOptions {
  /** Combined budget for connection setup and the call itself */
  deadlineMs: number;
}

export interface HealthyProbeOutcome {
  status: 'healthy';
  endpoint: string;
  blockHeight: bigint;
  latencyMs: number;
}

export interface UnhealthyProbeOutcome {
  status: 'unhealthy';
  endpoint: string;
  reason: ProbeFailureReason;
  message: string;
  latencyMs: number;
}

export type ProbeOutcome = HealthyProbeOutcome | UnhealthyProbeOutcome;
