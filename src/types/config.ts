/**
 * Plugin process configuration: types, defaults and the JSON Schema the
 * loader validates raw input against.
 *
 * Configuration is assembled once at startup from (highest first)
 * command-line flags, `PLUGIN_*` environment variables, an optional TOML
 * file named by `PLUGIN_CONFIG_FILE`, and the defaults below. It is
 * read-only for the rest of the process lifetime.
 */

import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** Transport the listener binds on. */
export type Network = 'tcp' | 'unix';

const VALID_NETWORKS: ReadonlySet<string> = new Set<Network>(['tcp', 'unix']);
const VALID_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

/** `[server]` section. */
export interface ServerSection {
  network: Network;
  /** Interface to bind for tcp when no explicit address is given. */
  host: string;
  port: number;
  /** Explicit listen address: `host:port` (or bare port) for tcp, a socket path for unix. */
  address?: string;
  /** Per-call handler deadline. */
  callTimeoutMs: number;
  /** How long shutdown waits for in-flight calls before aborting them. */
  drainTimeoutMs: number;
}

/** `[logging]` section. */
export interface LoggingSection {
  level: LogLevel;
}

/** Read-only plugin settings (the file's `[settings]` overlaid with the environment). */
export type PluginSettings = Readonly<Record<string, string>>;

/** Fully resolved runtime configuration. */
export interface RuntimeConfig {
  server: ServerSection;
  logging: LoggingSection;
  settings: PluginSettings;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_PORT = 50051;

/** Longest delay a Node.js timer honours; larger values fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_CONFIG: RuntimeConfig = {
  server: {
    network: 'tcp',
    host: '0.0.0.0',
    port: DEFAULT_PORT,
    callTimeoutMs: 10_000,
    drainTimeoutMs: 5_000,
  },
  logging: { level: 'info' },
  settings: {},
};

// ---------------------------------------------------------------------------
// CONFIG_JSON_SCHEMA
// ---------------------------------------------------------------------------

/**
 * Schema for the raw (file-shaped, snake_case) configuration object.
 * Unknown top-level sections are allowed for forward compatibility.
 */
export const CONFIG_JSON_SCHEMA = {
  $id: 'urn:plugin-runtime:schemas:config',
  type: 'object' as const,
  additionalProperties: true,
  properties: {
    server: {
      type: 'object',
      additionalProperties: false,
      properties: {
        network: { type: 'string', enum: [...VALID_NETWORKS] },
        host: { type: 'string', minLength: 1 },
        port: { type: 'integer', minimum: 0, maximum: 65535 },
        address: { type: 'string', minLength: 1 },
        call_timeout_ms: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS },
        drain_timeout_ms: { type: 'integer', minimum: 0, maximum: MAX_TIMEOUT_MS },
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: [...VALID_LEVELS] },
      },
    },
    settings: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
  },
};

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

function isNetwork(value: unknown): value is Network {
  return typeof value === 'string' && VALID_NETWORKS.has(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && VALID_LEVELS.has(value);
}

/**
 * Convert a raw configuration object that already passed
 * CONFIG_JSON_SCHEMA into a `RuntimeConfig`, applying defaults for
 * anything missing. The result and its settings are frozen.
 */
export function parseConfig(raw: Record<string, unknown>): RuntimeConfig {
  const rawServer = section(raw, 'server');
  const rawLogging = section(raw, 'logging');
  const rawSettings = section(raw, 'settings');
  const defaults = DEFAULT_CONFIG.server;

  const server: ServerSection = {
    network: isNetwork(rawServer['network']) ? rawServer['network'] : defaults.network,
    host: typeof rawServer['host'] === 'string' ? rawServer['host'] : defaults.host,
    port: typeof rawServer['port'] === 'number' ? rawServer['port'] : defaults.port,
    callTimeoutMs:
      typeof rawServer['call_timeout_ms'] === 'number'
        ? rawServer['call_timeout_ms']
        : defaults.callTimeoutMs,
    drainTimeoutMs:
      typeof rawServer['drain_timeout_ms'] === 'number'
        ? rawServer['drain_timeout_ms']
        : defaults.drainTimeoutMs,
  };
  if (typeof rawServer['address'] === 'string') {
    server.address = rawServer['address'];
  }

  const settings: Record<string, string> = {};
  for (const [key, value] of Object.entries(rawSettings)) {
    if (typeof value === 'string') settings[key] = value;
  }

  return Object.freeze({
    server: Object.freeze(server),
    logging: Object.freeze({
      level: isLogLevel(rawLogging['level']) ? rawLogging['level'] : DEFAULT_CONFIG.logging.level,
    }),
    settings: Object.freeze(settings),
  });
}

// ---------------------------------------------------------------------------
// formatListenAddress()
// ---------------------------------------------------------------------------

/**
 * Build the address string the transport binds.
 *
 * - unix: `unix:<path>` (an existing `unix:` prefix is kept as-is)
 * - tcp with an address containing `:`: used verbatim
 * - tcp with a bare port as address: `<host>:<port>`
 * - tcp without address: `<host>:<port>`
 */
export function formatListenAddress(server: ServerSection): string {
  if (server.network === 'unix') {
    const path = server.address ?? '';
    return path.startsWith('unix:') ? path : `unix:${path}`;
  }

  if (server.address !== undefined) {
    return server.address.includes(':') ? server.address : `${server.host}:${server.address}`;
  }

  return `${server.host}:${server.port}`;
}
