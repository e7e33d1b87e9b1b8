/**
 * Plugin runtime server: the state machine between the host and a plugin.
 *
 *   start: init plugin → resolve descriptor → bind transport → listening
 *   stop:  refuse new calls → drain in-flight calls → close transport → plugin.shutdown()
 *
 * Accepts an RpcTransport via dependency injection so unit tests can use
 * FakeTransport without opening a socket.
 */

import { randomUUID } from 'node:crypto';
import type { RuntimeConfig } from '../types/config.js';
import { formatListenAddress } from '../types/config.js';
import type { CapabilityDescriptor } from '../types/descriptor.js';
import type { Stage } from '../types/protocol.js';
import type { InboundCall, RpcTransport } from '../types/transport.js';
import { resolveDescriptor, toMetadata } from './descriptor.js';
import { ExchangeDispatcher } from './exchange-dispatcher.js';
import { createLogger, type Logger } from './logger.js';
import {
  BindError,
  ConfigurationError,
  UnavailableError,
  errorMessage,
  isPluginError,
} from './plugin-error.js';
import type { Plugin } from './plugin.js';
import {
  decodeExchange,
  encodeCapabilities,
  encodeDecision,
  encodeDescriptor,
  encodeMetadata,
} from './wire-codec.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ServerState = 'unstarted' | 'listening' | 'shutting_down' | 'stopped';

export type StateChangeListener = (state: ServerState, previous: ServerState) => void;

/** Injectable dependencies for the PluginServer. */
export interface ServerDeps {
  /** RPC transport: GrpcTransport in production, FakeTransport in tests. */
  transport: RpcTransport;
  /** Logger instance for structured logging. */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// PluginServer
// ---------------------------------------------------------------------------

export class PluginServer {
  private readonly plugin: Plugin;
  private readonly config: RuntimeConfig;
  private readonly transport: RpcTransport;
  private readonly logger: Logger;

  private currentState: ServerState = 'unstarted';
  private readonly listeners = new Set<StateChangeListener>();
  private readonly calls = new Set<AbortController>();
  private drainWaiters: Array<() => void> = [];
  private stopPromise: Promise<boolean> | null = null;

  // Set during start()
  private resolved: CapabilityDescriptor | null = null;
  private dispatcher: ExchangeDispatcher | null = null;
  private boundAddress: string | null = null;

  constructor(plugin: Plugin, config: RuntimeConfig, deps: ServerDeps) {
    this.plugin = plugin;
    this.config = config;
    this.transport = deps.transport;
    this.logger = deps.logger ?? createLogger('server');
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  get state(): ServerState {
    return this.currentState;
  }

  /** Number of exchange calls currently being handled. */
  get inFlight(): number {
    return this.calls.size;
  }

  /** The address the transport bound, once listening. */
  get address(): string | null {
    return this.boundAddress;
  }

  get descriptor(): CapabilityDescriptor | null {
    return this.resolved;
  }

  /** Observe state transitions. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // start()
  // -------------------------------------------------------------------------

  /**
   * Initialize the plugin, resolve its descriptor and bind the transport.
   * Resolves with the bound address.
   *
   * @throws ConfigurationError if called twice, or if init/describe fail.
   * @throws BindError if the listen address cannot be bound.
   */
  async start(): Promise<string> {
    if (this.currentState !== 'unstarted' || this.stopPromise !== null) {
      throw new ConfigurationError(`start() called while the server is ${this.currentState}`);
    }

    let booted: { descriptor: CapabilityDescriptor; address: string };
    try {
      booted = await this.boot();
    } catch (error: unknown) {
      this.setState('stopped');
      throw error;
    }

    const { descriptor, address } = booted;
    this.setState('listening');
    this.logger.info('listening', {
      address,
      plugin: descriptor.name,
      version: descriptor.version,
      stages: descriptor.stages.map((s) => `${s.stage}:${s.failurePolicy}`),
    });
    return address;
  }

  private async boot(): Promise<{ descriptor: CapabilityDescriptor; address: string }> {
    await this.initPlugin();
    const descriptor = await resolveDescriptor(this.plugin);
    this.resolved = descriptor;
    this.dispatcher = new ExchangeDispatcher({
      plugin: this.plugin,
      descriptor,
      settings: this.config.settings,
      callTimeoutMs: this.config.server.callTimeoutMs,
      logger: this.logger.child('dispatch'),
    });

    const listenAddress = formatListenAddress(this.config.server);
    let address: string;
    try {
      address = await this.transport.bind(listenAddress, (call) => this.handleCall(call));
    } catch (error: unknown) {
      throw new BindError(`failed to bind ${listenAddress}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.boundAddress = address;
    return { descriptor, address };
  }

  private async initPlugin(): Promise<void> {
    try {
      await this.plugin.init?.(this.config.settings);
    } catch (error: unknown) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`plugin init() failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  // -------------------------------------------------------------------------
  // stop()
  // -------------------------------------------------------------------------

  /**
   * Stop accepting calls, drain in-flight calls for up to
   * `drainTimeoutMs`, then close the transport and shut the plugin down.
   * Resolves `false` when the drain timed out and in-flight calls were
   * aborted. Repeated calls return the same promise.
   */
  stop(): Promise<boolean> {
    if (this.stopPromise === null) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<boolean> {
    if (this.currentState !== 'listening') {
      // Never started, or start() already failed.
      if (this.currentState !== 'stopped') this.setState('stopped');
      return true;
    }

    this.setState('shutting_down');
    const drainTimeoutMs = this.config.server.drainTimeoutMs;
    this.logger.info('draining', { in_flight: this.calls.size, drain_timeout_ms: drainTimeoutMs });

    const drained = await this.waitForDrain(drainTimeoutMs);
    if (drained) {
      await this.transport.shutdown();
    } else {
      this.logger.warn('drain timeout; abandoning in-flight calls', { in_flight: this.calls.size });
      for (const controller of this.calls) {
        controller.abort(new UnavailableError('server is shutting down'));
      }
      this.transport.forceShutdown();
    }

    try {
      await this.plugin.shutdown?.();
    } catch (error: unknown) {
      this.logger.error('plugin shutdown() failed', { error: errorMessage(error) });
    }

    this.setState('stopped');
    this.logger.info('stopped', { drained });
    return drained;
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.calls.size === 0) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.drainWaiters = this.drainWaiters.filter((waiter) => waiter !== onDrained);
        resolve(false);
      }, timeoutMs);

      const onDrained = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      this.drainWaiters.push(onDrained);
    });
  }

  // -------------------------------------------------------------------------
  // Call handling
  // -------------------------------------------------------------------------

  private async handleCall(call: InboundCall): Promise<unknown> {
    if (this.currentState !== 'listening') {
      throw new UnavailableError(`server is ${this.currentState.replace('_', ' ')}`);
    }

    try {
      return await this.route(call);
    } catch (error: unknown) {
      this.logger.warn('call failed', {
        method: call.method,
        peer: call.peer,
        error_code: isPluginError(error) ? error.code : 'INTERNAL',
        error: errorMessage(error),
      });
      throw error;
    }
  }

  private async route(call: InboundCall): Promise<unknown> {
    const descriptor = this.requireDescriptor();

    switch (call.method) {
      case 'Describe':
        return encodeDescriptor(descriptor);
      case 'GetMetadata':
        return encodeMetadata(toMetadata(descriptor));
      case 'GetCapabilities':
        return encodeCapabilities(descriptor);
      case 'CheckHealth':
        await this.probe('checkHealth');
        return {};
      case 'CheckReady':
        await this.probe('checkReady');
        return {};
      case 'HandleRequest':
        return this.exchange('request', call);
      case 'HandleResponse':
        return this.exchange('response', call);
      case 'Stop':
        // Reply first; the transport drains this call during shutdown.
        setImmediate(() => {
          this.stop().catch((error: unknown) => {
            this.logger.error('stop requested by host failed', { error: errorMessage(error) });
          });
        });
        this.logger.info('stop requested by host');
        return {};
    }
  }

  private async probe(name: 'checkHealth' | 'checkReady'): Promise<void> {
    try {
      await this.plugin[name]?.();
    } catch (error: unknown) {
      throw new UnavailableError(
        `plugin ${name === 'checkHealth' ? 'is unhealthy' : 'is not ready'}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async exchange(stage: Stage, call: InboundCall): Promise<unknown> {
    const dispatcher = this.requireDispatcher();
    const envelope = decodeExchange(call.request, stage);

    const controller = new AbortController();
    const onHostAbort = (): void => controller.abort(call.signal.reason);
    if (call.signal.aborted) {
      controller.abort(call.signal.reason);
    } else {
      call.signal.addEventListener('abort', onHostAbort, { once: true });
    }

    this.calls.add(controller);
    try {
      const decision = await dispatcher.dispatch(stage, envelope, {
        callId: randomUUID(),
        signal: controller.signal,
        deadline: call.deadline,
        peer: call.peer,
      });
      return encodeDecision(decision);
    } finally {
      call.signal.removeEventListener('abort', onHostAbort);
      this.calls.delete(controller);
      if (this.calls.size === 0) this.notifyDrained();
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const waiter of waiters) waiter();
  }

  private requireDescriptor(): CapabilityDescriptor {
    if (this.resolved === null) {
      throw new UnavailableError('server has not started');
    }
    return this.resolved;
  }

  private requireDispatcher(): ExchangeDispatcher {
    if (this.dispatcher === null) {
      throw new UnavailableError('server has not started');
    }
    return this.dispatcher;
  }

  private setState(next: ServerState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.logger.debug('state change', { from: previous, to: next });

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error: unknown) {
        this.logger.error('state listener failed', { error: errorMessage(error) });
      }
    }
  }
}
