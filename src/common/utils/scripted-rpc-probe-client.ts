import type { RpcProbeClient } from '@common/interfaces/rpc.interface';
import type { ProbeCallOptions } from '@types';
import { CallError, ConnectError } from './error-handler';

/**
 * Scripted reply for one endpoint URL
 */
export type ScriptedReply =
  | { kind: 'result'; value: string }
  | { kind: 'connect-error'; message?: string }
  | { kind: 'call-error'; message?: string; timedOut?: boolean }
  | { kind: 'hang' };

export interface RecordedCall {
  url: string;
  method: string;
  deadlineMs: number;
}

/**
 * Deterministic {@link RpcProbeClient} that answers from a script instead of the network.
 *
 * Replies queued with `enqueue` are consumed first, then the standing reply set with
 * `respond` is used. A `hang` reply waits for the deadline and fails like the real client.
 */
export class ScriptedRpcProbeClient implements RpcProbeClient {
  readonly calls: RecordedCall[] = [];
  private readonly standing = new Map<string, ScriptedReply>();
  private readonly queued = new Map<string, ScriptedReply[]>();
  private closed = false;

  respond(url: string, reply: ScriptedReply): this {
    this.standing.set(url, reply);
    return this;
  }

  enqueue(url: string, ...replies: ScriptedReply[]): this {
    this.queued.set(url, [...(this.queued.get(url) ?? []), ...replies]);
    return this;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async call(url: string, method: string, options: ProbeCallOptions): Promise<string> {
    this.calls.push({ url, method, deadlineMs: options.deadlineMs });

    const reply = this.queued.get(url)?.shift() ?? this.standing.get(url);
    if (!reply) {
      throw new ConnectError(`No scripted reply for ${url}`, url, method);
    }

    switch (reply.kind) {
      case 'result':
        return reply.value;
      case 'connect-error':
        throw new ConnectError(reply.message ?? 'connect ECONNREFUSED', url, method);
      case 'call-error':
        throw new CallError(reply.message ?? 'RPC error', url, method, reply.timedOut ?? false);
      case 'hang':
        await new Promise<void>(resolve => setTimeout(resolve, options.deadlineMs));
        throw new CallError(`Deadline of ${options.deadlineMs}ms exceeded calling ${method}`, url, method, true);
    }
  }

  close(): void {
    this.closed = true;
  }
}
