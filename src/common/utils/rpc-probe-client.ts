import { RPC } from '@common/constants/config';
import type { JsonRpcErrorObject, JsonRpcRequest, RpcProbeClient } from '@common/interfaces/rpc.interface';
import { Logger } from '@nestjs/common';
import type { ProbeCallOptions } from '@types';
import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { Socket } from 'net';
import { TLSSocket } from 'tls';
import { CallError, ConnectError, errorMessage, RpcError } from './error-handler';

/**
 * Connection pool and connect budget for {@link HttpRpcProbeClient}
 */
export interface HttpRpcProbeClientOptions {
  /**
   * Time allowed for TCP connect and TLS handshake (default: 10000ms)
   */
  connectTimeoutMs?: number;

  /**
   * Idle keep-alive sockets kept per host (default: 100)
   */
  maxIdleSockets?: number;

  /**
   * Idle sockets are destroyed after this long (default: 90000ms)
   */
  idleSocketTimeoutMs?: number;
}

/**
 * Per-call connection progress, filled in by the transport
 */
interface CallState {
  connected: boolean;
  connectTimedOut: boolean;
  timedOut: boolean;
  connectTimer?: NodeJS.Timeout;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRpcError(value: unknown): JsonRpcErrorObject | null {
  if (value === undefined || value === null) return null;
  if (!isRecord(value)) return { code: 0, message: String(value) };

  return {
    code: typeof value.code === 'number' ? value.code : 0,
    message: typeof value.message === 'string' ? value.message : JSON.stringify(value),
    data: value.data,
  };
}

/**
 * JSON-RPC over HTTP(S) with pooled keep-alive connections.
 *
 * Every call runs under its own deadline covering connection setup and the call itself.
 * When the deadline elapses the request is aborted and its socket destroyed.
 */
export class HttpRpcProbeClient implements RpcProbeClient {
  private readonly logger = new Logger(HttpRpcProbeClient.name);
  private readonly options: Required<HttpRpcProbeClientOptions>;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly client: AxiosInstance;
  private requestId = 1;

  constructor(options?: HttpRpcProbeClientOptions) {
    this.options = {
      connectTimeoutMs: options?.connectTimeoutMs ?? RPC.PROBE.CONNECT_TIMEOUT_MS,
      maxIdleSockets: options?.maxIdleSockets ?? RPC.POOL.MAX_IDLE_SOCKETS,
      idleSocketTimeoutMs: options?.idleSocketTimeoutMs ?? RPC.POOL.IDLE_TIMEOUT_MS,
    };

    const agentOptions: http.AgentOptions = {
      keepAlive: true,
      maxFreeSockets: this.options.maxIdleSockets,
      timeout: this.options.idleSocketTimeoutMs,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.client = axios.create({
      headers: { 'Content-Type': 'application/json' },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      maxRedirects: 0,
      responseType: 'json',
    });
  }

  async call(url: string, method: string, options: ProbeCallOptions): Promise<string> {
    const request: JsonRpcRequest = {
      jsonrpc: RPC.JSONRPC_VERSION,
      method,
      params: [],
      id: this.requestId++,
    };

    const state: CallState = { connected: false, connectTimedOut: false, timedOut: false };
    const controller = new AbortController();
    const deadline = setTimeout(() => {
      state.timedOut = true;
      controller.abort();
    }, options.deadlineMs);

    const startTime = Date.now();
    let data: unknown;

    try {
      const response = await this.client.post<unknown>(url, request, {
        signal: controller.signal,
        transport: this.createTransport(state),
      });
      data = response.data;
    } catch (error) {
      throw this.classifyError(error, state, url, method, options.deadlineMs);
    } finally {
      clearTimeout(deadline);
      clearTimeout(state.connectTimer);
    }

    this.logger.debug(`RPC call ${method} on ${url} completed in ${Date.now() - startTime}ms`);

    return this.readResult(data, url, method);
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  /**
   * Node transport that records when the socket is usable and enforces the connect budget
   */
  private createTransport(state: CallState) {
    const watchSocket = (socket: Socket): void => {
      // Reused keep-alive socket
      if (!socket.connecting) {
        state.connected = true;
        return;
      }

      const onReady = (): void => {
        state.connected = true;
        clearTimeout(state.connectTimer);
      };

      state.connectTimer = setTimeout(() => {
        state.connectTimedOut = true;
        socket.destroy(new Error(`Connection not established within ${this.options.connectTimeoutMs}ms`));
      }, this.options.connectTimeoutMs);

      socket.once(socket instanceof TLSSocket ? 'secureConnect' : 'connect', onReady);
      socket.once('close', () => clearTimeout(state.connectTimer));
    };

    return {
      request: (options: https.RequestOptions, callback: (res: http.IncomingMessage) => void): http.ClientRequest => {
        const req = options.protocol === 'https:' ? https.request(options, callback) : http.request(options, callback);
        req.once('socket', watchSocket);
        return req;
      },
    };
  }

  /**
   * Map a transport failure onto the probe error taxonomy
   */
  private classifyError(error: unknown, state: CallState, url: string, method: string, deadlineMs: number): RpcError {
    if (state.timedOut) {
      return new CallError(`Deadline of ${deadlineMs}ms exceeded calling ${method}`, url, method, true);
    }

    if (state.connectTimedOut) {
      return new ConnectError(`Connection not established within ${this.options.connectTimeoutMs}ms`, url, method);
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new CallError(`HTTP error ${error.response.status}: ${error.response.statusText}`, url, method);
      }

      if (!state.connected) {
        const code = error.code ? `${error.code}: ` : '';
        return new ConnectError(`${code}${error.message}`, url, method, { code: error.code });
      }

      return new CallError(`No response received: ${error.message}`, url, method);
    }

    return new CallError(errorMessage(error), url, method);
  }

  /**
   * Pull the string result out of a JSON-RPC response body
   */
  private readResult(data: unknown, url: string, method: string): string {
    if (!isRecord(data)) {
      throw new CallError('Malformed JSON-RPC response', url, method);
    }

    const rpcError = readRpcError(data.error);
    if (rpcError) {
      throw new CallError(`RPC error: ${rpcError.message} (code: ${rpcError.code})`, url, method, false, {
        rpcCode: rpcError.code,
      });
    }

    if (typeof data.result !== 'string') {
      throw new CallError(`Unexpected result type: ${data.result === null ? 'null' : typeof data.result}`, url, method);
    }

    return data.result;
  }
}
