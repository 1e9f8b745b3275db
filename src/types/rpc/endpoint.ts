/**
 * A configured RPC endpoint. `name` doubles as the metric label and must be unique.
 */
export interface RpcEndpoint {
  readonly name: string;
  readonly url: string;
}
