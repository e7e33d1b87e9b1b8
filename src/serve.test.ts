import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { serve, EXIT_FAILURE, EXIT_OK, type ServeDeps } from './serve.js';
import { continueUnchanged } from './core/decision.js';
import { resetLogging, type LogEntry } from './core/logger.js';
import { CancelledError } from './core/plugin-error.js';
import type { Plugin } from './core/plugin.js';
import type { PluginServer } from './core/server.js';
import { FakeTransport } from './testing/fake-transport.js';
import type { RuntimeConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const plugin: Plugin = {
  describe: () => ({ name: 'noop-plugin', version: '0.1.0', stages: ['request'] }),
  handleRequest: async () => continueUnchanged(),
};

/** Process-signal stand-in: records listeners so a test can emit signals. */
function createSignals(): {
  onSignal: NonNullable<ServeDeps['onSignal']>;
  emit: (signal: NodeJS.Signals) => void;
  listenerCount: () => number;
} {
  const listeners = new Map<NodeJS.Signals, () => void>();
  return {
    onSignal: (signal, listener) => {
      listeners.set(signal, listener);
      return () => {
        listeners.delete(signal);
      };
    },
    emit: (signal) => listeners.get(signal)?.(),
    listenerCount: () => listeners.size,
  };
}

let logs: LogEntry[];
let transport: FakeTransport;
let signals: ReturnType<typeof createSignals>;
let loaded: RuntimeConfig | null;

function deps(overrides: Partial<ServeDeps> = {}): ServeDeps {
  return {
    argv: [],
    env: {},
    logSink: (entry) => logs.push(entry),
    onSignal: signals.onSignal,
    createTransport: (config) => {
      loaded = config;
      return transport;
    },
    ...overrides,
  };
}

beforeEach(() => {
  logs = [];
  transport = new FakeTransport();
  signals = createSignals();
  loaded = null;
});

afterEach(() => {
  resetLogging();
});

// ---------------------------------------------------------------------------
// serve()
// ---------------------------------------------------------------------------

describe('serve', () => {
  it('listens on the default tcp address and exits 0 after SIGTERM', async () => {
    let listening: string | null = null;
    const code = await serve(
      plugin,
      deps({
        onListening: (address) => {
          listening = address;
          setImmediate(() => signals.emit('SIGTERM'));
        },
      }),
    );

    expect(code).toBe(EXIT_OK);
    expect(listening).toBe('0.0.0.0:50051');
    expect(transport.closed).toBe('graceful');
    expect(logs.find((log) => log.msg === 'shutdown signal received')?.meta).toEqual({
      signal: 'SIGTERM',
    });
  });

  it('stops on SIGINT as well', async () => {
    const code = await serve(
      plugin,
      deps({ onListening: () => setImmediate(() => signals.emit('SIGINT')) }),
    );
    expect(code).toBe(EXIT_OK);
  });

  it('removes its signal listeners once stopped', async () => {
    await serve(plugin, deps({ onListening: () => setImmediate(() => signals.emit('SIGTERM')) }));
    expect(signals.listenerCount()).toBe(0);
  });

  it('exits 0 when the host sends Stop', async () => {
    let server: PluginServer | null = null;
    const code = await serve(
      plugin,
      deps({
        onListening: (_address, s) => {
          server = s;
          setImmediate(() => {
            transport.call('Stop').catch(() => undefined);
          });
        },
      }),
    );

    expect(code).toBe(EXIT_OK);
    expect(server).not.toBeNull();
    expect(transport.closed).toBe('graceful');
  });

  it('exits 1 when shutdown abandons in-flight calls', async () => {
    const stuck: Plugin = { ...plugin, handleRequest: () => new Promise<never>(() => undefined) };
    let pending: Promise<unknown> = Promise.resolve();
    const code = await serve(
      stuck,
      deps({
        env: { PLUGIN_DRAIN_TIMEOUT_MS: '0' },
        onListening: () => {
          pending = transport
            .call('HandleRequest', { method: 'GET', url: 'http://upstream.test/' })
            .catch((error: unknown) => error);
          setImmediate(() => signals.emit('SIGTERM'));
        },
      }),
    );

    expect(code).toBe(EXIT_FAILURE);
    expect(transport.closed).toBe('forced');
    expect(await pending).toBeInstanceOf(CancelledError);
    expect(logs.find((log) => log.msg === 'shutdown forced before in-flight calls finished')?.level).toBe(
      'error',
    );
  });

  it('passes flags to the configuration', async () => {
    await serve(
      plugin,
      deps({
        argv: ['--address', '/tmp/plugin-test.sock'],
        onListening: () => setImmediate(() => signals.emit('SIGTERM')),
      }),
    );

    expect(loaded?.server.network).toBe('unix');
    expect(transport.listenAddress).toBe('unix:/tmp/plugin-test.sock');
  });

  it('applies the configured log level', async () => {
    await serve(
      plugin,
      deps({
        env: { PLUGIN_LOG_LEVEL: 'warn' },
        onListening: () => setImmediate(() => signals.emit('SIGTERM')),
      }),
    );

    expect(logs.some((log) => log.level === 'info' || log.level === 'debug')).toBe(false);
  });

  it('exits 1 on an invalid configuration without binding', async () => {
    const code = await serve(plugin, deps({ argv: ['--network', 'tcp'] }));

    expect(code).toBe(EXIT_FAILURE);
    expect(loaded).toBeNull();
    const entry = logs.find((log) => log.msg === 'invalid configuration');
    expect(entry?.level).toBe('error');
    expect(entry?.error_code).toBe('CONFIGURATION_ERROR');
    expect(entry?.meta?.['fatal']).toBe(true);
  });

  it('exits 1 when the address cannot be bound', async () => {
    transport = new FakeTransport({ bindError: new Error('EADDRINUSE') });
    const code = await serve(plugin, deps());

    expect(code).toBe(EXIT_FAILURE);
    const entry = logs.find((log) => log.msg === 'startup failed');
    expect(entry?.error_code).toBe('BIND_ERROR');
    expect(entry?.meta).toEqual({
      error: 'failed to bind 0.0.0.0:50051: EADDRINUSE',
      fatal: true,
    });
  });

  it('exits 1 when the plugin fails to initialize', async () => {
    const failing: Plugin = {
      ...plugin,
      init: () => {
        throw new Error('database unreachable');
      },
    };
    const code = await serve(failing, deps());

    expect(code).toBe(EXIT_FAILURE);
    expect(transport.listenAddress).toBeNull();
    expect(logs.find((log) => log.msg === 'startup failed')?.error_code).toBe(
      'CONFIGURATION_ERROR',
    );
  });
});
