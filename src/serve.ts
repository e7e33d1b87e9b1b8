/**
 * Plugin process entry point.
 *
 * `serve(plugin)` is the one call a plugin's main module makes: it loads
 * the configuration, starts a PluginServer on a gRPC transport, and
 * blocks until SIGTERM/SIGINT or a host Stop RPC has drained the server.
 * The returned promise resolves with the process exit code.
 *
 * Usage:
 *   serve(new MyPlugin()).then((code) => { process.exitCode = code; });
 */

import type { Environment } from './core/config-loader.js';
import { loadConfig } from './core/config-loader.js';
import { GrpcTransport } from './core/grpc-transport.js';
import type { LogSink, Logger } from './core/logger.js';
import { configureLogging, createLogger } from './core/logger.js';
import type { Plugin } from './core/plugin.js';
import { errorMessage, isPluginError } from './core/plugin-error.js';
import { PluginServer } from './core/server.js';
import type { RuntimeConfig } from './types/config.js';
import type { RpcTransport } from './types/transport.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/** Signals that begin a graceful shutdown. */
export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

// ---------------------------------------------------------------------------
// ServeDeps
// ---------------------------------------------------------------------------

/** Injectable dependencies for `serve()`. Production uses the defaults. */
export interface ServeDeps {
  /** Command-line arguments without node and script. Default: process.argv.slice(2). */
  argv?: readonly string[];
  /** Default: process.env. */
  env?: Environment;
  /** Config file reader. Default: fs.readFileSync. */
  readFile?: (path: string) => string;
  /** Build the transport for the loaded config. Default: a GrpcTransport. */
  createTransport?: (config: RuntimeConfig) => RpcTransport;
  /**
   * Subscribe to a process signal; returns an unsubscribe function.
   * Default: process.once/process.off.
   */
  onSignal?: (signal: NodeJS.Signals, listener: () => void) => () => void;
  /** Log sink. Default: JSON lines on stdout. */
  logSink?: LogSink;
  /** Called once the server is listening, with the bound address. */
  onListening?: (address: string, server: PluginServer) => void;
}

function processSignal(signal: NodeJS.Signals, listener: () => void): () => void {
  process.once(signal, listener);
  return () => {
    process.off(signal, listener);
  };
}

// ---------------------------------------------------------------------------
// serve()
// ---------------------------------------------------------------------------

/**
 * Run a plugin until it is told to stop.
 *
 * Resolves with EXIT_OK after a graceful stop, or EXIT_FAILURE when the
 * configuration is invalid, the address cannot be bound, the plugin fails
 * to start, or shutdown itself fails. Never rejects.
 */
export async function serve(plugin: Plugin, deps: ServeDeps = {}): Promise<number> {
  configureLogging(deps.logSink !== undefined ? { sink: deps.logSink } : {});
  const logger = createLogger('serve');

  let config: RuntimeConfig;
  try {
    config = loadConfig({
      argv: deps.argv ?? process.argv.slice(2),
      env: deps.env,
      readFile: deps.readFile,
    });
  } catch (error: unknown) {
    logFatal(logger, 'invalid configuration', error);
    return EXIT_FAILURE;
  }

  configureLogging({ level: config.logging.level });

  const transport = deps.createTransport?.(config) ?? new GrpcTransport();
  const server = new PluginServer(plugin, config, {
    transport,
    logger: createLogger('server'),
  });

  let address: string;
  try {
    address = await server.start();
  } catch (error: unknown) {
    logFatal(logger, 'startup failed', error);
    return EXIT_FAILURE;
  }
  deps.onListening?.(address, server);

  const onSignal = deps.onSignal ?? processSignal;
  const unsubscribers: Array<() => void> = [];

  await new Promise<void>((resolve) => {
    for (const signal of SHUTDOWN_SIGNALS) {
      unsubscribers.push(
        onSignal(signal, () => {
          logger.info('shutdown signal received', { signal });
          resolve();
        }),
      );
    }
    // A host Stop RPC stops the server without a signal.
    unsubscribers.push(
      server.onStateChange((state) => {
        if (state === 'shutting_down' || state === 'stopped') resolve();
      }),
    );
  });

  for (const unsubscribe of unsubscribers) unsubscribe();

  let drained: boolean;
  try {
    drained = await server.stop();
  } catch (error: unknown) {
    logFatal(logger, 'shutdown failed', error);
    return EXIT_FAILURE;
  }
  if (!drained) {
    logger.error('shutdown forced before in-flight calls finished');
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}

function logFatal(logger: Logger, message: string, error: unknown): void {
  if (isPluginError(error)) {
    logger.error(message, { error: error.message, error_code: error.code, fatal: error.fatal });
  } else {
    logger.error(message, { error: errorMessage(error) });
  }
}
