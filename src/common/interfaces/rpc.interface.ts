import type { ProbeCallOptions } from '@types';

/**
 * Injection token for the probe client used by the health check engine
 */
export const RPC_PROBE_CLIENT = Symbol('RPC_PROBE_CLIENT');

/**
 * Performs exactly one remote call per invocation against one endpoint.
 *
 * Resolves with the raw `result` string. Rejects with `ConnectError` when no connection
 * could be established, or with `CallError` for anything that went wrong afterwards,
 * including the deadline running out.
 */
export interface RpcProbeClient {
  call(url: string, method: string, options: ProbeCallOptions): Promise<string>;

  /**
   * Release pooled connections
   */
  close(): void;
}

/**
 * JSON-RPC request payload
 */
export interface JsonRpcRequest {
  jsonrpc: string;
  method: string;
  params: unknown[];
  id: number;
}

/**
 * JSON-RPC error member
 */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}
