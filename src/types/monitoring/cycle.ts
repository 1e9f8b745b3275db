import type { ProbeOutcome } from '../rpc/probe';

/**
 * Result of one scheduler tick across every configured endpoint
 */
export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  outcomes: ProbeOutcome[];
}

export interface CycleSummary {
  endpoints: number;
  healthy: number;
  unhealthy: number;
  finishedAt: string;
  durationMs: number;
}
