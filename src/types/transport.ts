/**
 * Transport abstraction for the plugin RPC service.
 *
 * The server never touches gRPC directly: it binds an RpcTransport and
 * receives one InboundCall per RPC. This keeps the server testable with
 * an in-memory FakeTransport (see src/testing/fake-transport.ts), while
 * production uses GrpcTransport.
 */

/** RPC methods of the `plugin.v1.Plugin` service. */
export const RPC_METHODS = [
  'Describe',
  'GetMetadata',
  'GetCapabilities',
  'CheckHealth',
  'CheckReady',
  'HandleRequest',
  'HandleResponse',
  'Stop',
] as const;

export type RpcMethod = (typeof RPC_METHODS)[number];

/** One unary RPC as seen by the server. */
export interface InboundCall {
  method: RpcMethod;
  /** The decoded request message; untrusted until the wire codec narrows it. */
  request: unknown;
  /** Aborts when the host cancels the call or the transport closes it. */
  signal: AbortSignal;
  /** Host deadline in epoch milliseconds, when the host set one. */
  deadline?: number;
  /** Peer address as reported by the transport. */
  peer?: string;
}

/**
 * Handles one call and resolves with the response message. Rejections are
 * mapped to RPC status codes by the transport (PluginError codes, anything
 * else becomes an internal error without details).
 */
export type CallHandler = (call: InboundCall) => Promise<unknown>;

export interface RpcTransport {
  /**
   * Start listening on `address` (`host:port` or `unix:<path>`).
   * Resolves with the address actually bound (port 0 becomes the chosen
   * port). Rejects when the address cannot be bound.
   */
  bind(address: string, handler: CallHandler): Promise<string>;

  /** Stop accepting calls and resolve once in-flight calls have finished. */
  shutdown(): Promise<void>;

  /** Close immediately, cancelling any call still running. */
  forceShutdown(): void;
}
