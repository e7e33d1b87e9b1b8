import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, parseServeArgs } from './config-loader.js';
import { ConfigurationError } from './plugin-error.js';
import { DEFAULT_CONFIG } from '../types/config.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createTempRoot(): string {
  const root = join(
    tmpdir(),
    `plugin-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );
  mkdirSync(root, { recursive: true });
  return root;
}

/** A readFile stand-in serving one in-memory file. */
function fileReader(path: string, content: string): (p: string) => string {
  return (p) => {
    if (p !== path) throw new Error(`ENOENT: no such file or directory, open '${p}'`);
    return content;
  };
}

function expectConfigError(fn: () => unknown, fragment: string): void {
  try {
    fn();
  } catch (error: unknown) {
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof Error ? error.message : '').toContain(fragment);
    return;
  }
  throw new Error('expected a ConfigurationError');
}

// ---------------------------------------------------------------------------
// parseServeArgs()
// ---------------------------------------------------------------------------

describe('parseServeArgs', () => {
  it('returns nothing for an empty argv', () => {
    expect(parseServeArgs([])).toEqual({});
  });

  it('defaults the network to unix when an address is given', () => {
    expect(parseServeArgs(['--address', '/tmp/p.sock'])).toEqual({
      address: '/tmp/p.sock',
      network: 'unix',
    });
  });

  it('accepts the --flag=value form', () => {
    expect(parseServeArgs(['--network=tcp', '--address=127.0.0.1:9000'])).toEqual({
      address: '127.0.0.1:9000',
      network: 'tcp',
    });
  });

  it('requires --address when any flag is given', () => {
    expectConfigError(() => parseServeArgs(['--network', 'tcp']), '--address is required');
  });

  it('rejects an unknown flag', () => {
    expectConfigError(() => parseServeArgs(['--port', '1']), 'unknown flag "--port"');
  });

  it('rejects a positional argument', () => {
    expectConfigError(() => parseServeArgs(['serve']), 'unexpected argument "serve"');
  });

  it('rejects a flag without a value', () => {
    expectConfigError(() => parseServeArgs(['--address']), '--address requires a value');
    expectConfigError(
      () => parseServeArgs(['--address', '--network', 'tcp']),
      '--address requires a value',
    );
  });

  it('rejects an unknown network', () => {
    expectConfigError(
      () => parseServeArgs(['--network', 'udp', '--address', 'x']),
      '--network must be "unix" or "tcp", got "udp"',
    );
  });
});

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  it('returns the defaults with no flags, env or file', () => {
    expect(loadConfig({ argv: [], env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('maps PLUGIN_* variables onto the server and logging sections', () => {
    const config = loadConfig({
      env: {
        PLUGIN_PORT: '6000',
        PLUGIN_HOST: '127.0.0.1',
        PLUGIN_CALL_TIMEOUT_MS: '250',
        PLUGIN_DRAIN_TIMEOUT_MS: '0',
        PLUGIN_LOG_LEVEL: 'debug',
      },
    });

    expect(config.server).toEqual({
      network: 'tcp',
      host: '127.0.0.1',
      port: 6000,
      callTimeoutMs: 250,
      drainTimeoutMs: 0,
    });
    expect(config.logging.level).toBe('debug');
  });

  it('ignores empty environment values', () => {
    const config = loadConfig({ env: { PLUGIN_PORT: '', PLUGIN_LOG_LEVEL: '' } });
    expect(config.server.port).toBe(50051);
    expect(config.logging.level).toBe('info');
  });

  it('exposes the environment as plugin settings', () => {
    const config = loadConfig({ env: { AUTH_TOKEN: 'test-secret' } });
    expect(config.settings['AUTH_TOKEN']).toBe('test-secret');
  });

  it('lets flags win over the environment', () => {
    const config = loadConfig({
      argv: ['--address', '/tmp/flag.sock'],
      env: { PLUGIN_NETWORK: 'tcp', PLUGIN_ADDRESS: '127.0.0.1:7000' },
    });
    expect(config.server.network).toBe('unix');
    expect(config.server.address).toBe('/tmp/flag.sock');
  });

  it('reports a non-numeric port through the schema', () => {
    expectConfigError(
      () => loadConfig({ env: { PLUGIN_PORT: 'eighty' } }),
      '/server/port: must be integer',
    );
  });

  it('reports an out-of-range port', () => {
    expectConfigError(
      () => loadConfig({ env: { PLUGIN_PORT: '70000' } }),
      '/server/port: must be <= 65535',
    );
  });

  it('rejects timeouts a timer cannot wait for', () => {
    expectConfigError(
      () => loadConfig({ env: { PLUGIN_CALL_TIMEOUT_MS: '3000000000' } }),
      '/server/call_timeout_ms: must be <= 2147483647',
    );
    expectConfigError(
      () => loadConfig({ env: { PLUGIN_DRAIN_TIMEOUT_MS: '3000000000' } }),
      '/server/drain_timeout_ms: must be <= 2147483647',
    );
  });

  it('accepts the longest timer delay', () => {
    const config = loadConfig({ env: { PLUGIN_CALL_TIMEOUT_MS: '2147483647' } });
    expect(config.server.callTimeoutMs).toBe(2_147_483_647);
  });

  it('reports an unknown log level', () => {
    expectConfigError(
      () => loadConfig({ env: { PLUGIN_LOG_LEVEL: 'verbose' } }),
      '/logging/level: must be equal to one of the allowed values',
    );
  });

  it('requires an address for the unix network', () => {
    expectConfigError(
      () => loadConfig({ env: { PLUGIN_NETWORK: 'unix' } }),
      'the unix network needs a socket path',
    );
  });

  describe('config file', () => {
    const path = '/etc/plugin/config.toml';

    it('reads the TOML file named by PLUGIN_CONFIG_FILE', () => {
      const toml = [
        '[server]',
        'network = "unix"',
        'address = "/run/plugin.sock"',
        'call_timeout_ms = 500',
        '',
        '[logging]',
        'level = "warn"',
        '',
        '[settings]',
        'AUTH_TOKEN = "from-file"',
      ].join('\n');

      const config = loadConfig({
        env: { PLUGIN_CONFIG_FILE: path },
        readFile: fileReader(path, toml),
      });

      expect(config.server.network).toBe('unix');
      expect(config.server.address).toBe('/run/plugin.sock');
      expect(config.server.callTimeoutMs).toBe(500);
      expect(config.logging.level).toBe('warn');
      expect(config.settings['AUTH_TOKEN']).toBe('from-file');
    });

    it('lets the environment win over the file', () => {
      const toml = '[server]\nport = 6000\n[settings]\nAUTH_TOKEN = "from-file"\n';
      const config = loadConfig({
        env: { PLUGIN_CONFIG_FILE: path, PLUGIN_PORT: '7000', AUTH_TOKEN: 'from-env' },
        readFile: fileReader(path, toml),
      });

      expect(config.server.port).toBe(7000);
      expect(config.settings['AUTH_TOKEN']).toBe('from-env');
    });

    it('treats an empty file as no file', () => {
      const config = loadConfig({
        env: { PLUGIN_CONFIG_FILE: path },
        readFile: fileReader(path, '  \n'),
      });
      expect(config.server).toEqual(DEFAULT_CONFIG.server);
    });

    it('fails on an unreadable file', () => {
      expectConfigError(
        () => loadConfig({ env: { PLUGIN_CONFIG_FILE: '/missing.toml' }, readFile: fileReader(path, '') }),
        'cannot read config file /missing.toml',
      );
    });

    it('fails on malformed TOML', () => {
      expectConfigError(
        () =>
          loadConfig({
            env: { PLUGIN_CONFIG_FILE: path },
            readFile: fileReader(path, '[server\nport = 1\n'),
          }),
        `invalid TOML in ${path}`,
      );
    });

    it('rejects unknown keys in the server section', () => {
      expectConfigError(
        () =>
          loadConfig({
            env: { PLUGIN_CONFIG_FILE: path },
            readFile: fileReader(path, '[server]\nworkers = 4\n'),
          }),
        '/server: additional property "workers" not allowed',
      );
    });

    it('rejects non-string settings', () => {
      expectConfigError(
        () =>
          loadConfig({
            env: { PLUGIN_CONFIG_FILE: path },
            readFile: fileReader(path, '[settings]\nRETRIES = 3\n'),
          }),
        '/settings/RETRIES: must be string',
      );
    });
  });

  describe('on disk', () => {
    let testRoot: string;

    beforeEach(() => {
      testRoot = createTempRoot();
    });

    afterEach(() => {
      rmSync(testRoot, { recursive: true, force: true });
    });

    it('reads the file with fs by default', () => {
      const file = join(testRoot, 'config.toml');
      writeFileSync(file, '[server]\nport = 6100\n', 'utf-8');

      const config = loadConfig({ env: { PLUGIN_CONFIG_FILE: file } });
      expect(config.server.port).toBe(6100);
    });
  });
});
