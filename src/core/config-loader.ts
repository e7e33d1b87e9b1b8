/**
 * Configuration loader for plugin processes.
 *
 * Assembles the raw configuration from (highest precedence first):
 *   1. `--address` / `--network` flags, passed by a supervising host
 *   2. `PLUGIN_*` environment variables
 *   3. the TOML file named by `PLUGIN_CONFIG_FILE`, parsed with smol-toml
 *   4. DEFAULT_CONFIG
 * then validates it against CONFIG_JSON_SCHEMA and returns a frozen
 * RuntimeConfig. Every problem is reported as a ConfigurationError.
 */

import { readFileSync } from 'node:fs';
import { parse as parseTOML } from 'smol-toml';
import type { Network, RuntimeConfig } from '../types/config.js';
import { CONFIG_JSON_SCHEMA, parseConfig } from '../types/config.js';
import { ConfigurationError, errorMessage } from './plugin-error.js';
import { formatErrorMessage } from './plugin.js';
import { SchemaValidator } from './schema-validator.js';

const validator = new SchemaValidator();
validator.compile('config', CONFIG_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Flags a supervising host passes on the command line. */
export interface ServeArgs {
  address?: string;
  network?: Network;
}

const FLAGS = new Set(['address', 'network']);

/**
 * Parse command-line flags (without the node and script entries).
 *
 * Accepts `--flag value` and `--flag=value`. When any flag is given,
 * `--address` is required and `--network` defaults to `unix`; with no
 * flags at all the process runs standalone on tcp.
 */
export function parseServeArgs(args: readonly string[]): ServeArgs {
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`unexpected argument "${arg}"`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!FLAGS.has(name)) {
      throw new ConfigurationError(`unknown flag "--${name}"`, { field: name });
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value.length === 0 || value.startsWith('--')) {
      throw new ConfigurationError(`--${name} requires a value`, { field: name });
    }
    values.set(name, value);
  }

  if (values.size === 0) return {};

  const address = values.get('address');
  if (address === undefined) {
    throw new ConfigurationError(
      formatErrorMessage({
        component: 'config',
        what: '--address is required when command-line flags are given',
        how: 'pass --address <socket path|host:port>, or run without flags to listen on PLUGIN_PORT',
      }),
      { field: 'address' },
    );
  }

  const network = values.get('network') ?? 'unix';
  if (network !== 'unix' && network !== 'tcp') {
    throw new ConfigurationError(`--network must be "unix" or "tcp", got "${network}"`, {
      field: 'network',
    });
  }

  return { address, network };
}

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

export type Environment = Readonly<Record<string, string | undefined>>;

/** Environment variables that map onto `[server]` keys. */
const SERVER_ENV: ReadonlyArray<[string, string, 'string' | 'number']> = [
  ['PLUGIN_PORT', 'port', 'number'],
  ['PLUGIN_HOST', 'host', 'string'],
  ['PLUGIN_NETWORK', 'network', 'string'],
  ['PLUGIN_ADDRESS', 'address', 'string'],
  ['PLUGIN_CALL_TIMEOUT_MS', 'call_timeout_ms', 'number'],
  ['PLUGIN_DRAIN_TIMEOUT_MS', 'drain_timeout_ms', 'number'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A numeric string becomes a number; anything else is left for the schema to reject. */
function toNumber(value: string): number | string {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  return trimmed.length > 0 && Number.isFinite(parsed) ? parsed : value;
}

function readConfigFile(path: string, readFile: (path: string) => string): Record<string, unknown> {
  let content: string;
  try {
    content = readFile(path);
  } catch (error: unknown) {
    throw new ConfigurationError(`cannot read config file ${path}: ${errorMessage(error)}`, {
      field: 'PLUGIN_CONFIG_FILE',
      cause: error,
    });
  }

  if (content.trim().length === 0) return {};

  try {
    return parseTOML(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`invalid TOML in ${path}: ${errorMessage(error)}`, {
      field: 'PLUGIN_CONFIG_FILE',
      cause: error,
    });
  }
}

/** Overlay `overrides` on a file section, leaving a malformed section for the schema to report. */
function overlay(section: unknown, overrides: Record<string, unknown>): unknown {
  if (Object.keys(overrides).length === 0) return section;
  if (section === undefined) return overrides;
  return isRecord(section) ? { ...section, ...overrides } : section;
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/** Injectable sources for `loadConfig()`. */
export interface ConfigSources {
  /** Command-line arguments without node and script. Default: none. */
  argv?: readonly string[];
  /** Default: process.env. */
  env?: Environment;
  /** Default: fs.readFileSync(path, 'utf-8'). */
  readFile?: (path: string) => string;
}

/**
 * Build the RuntimeConfig for this process.
 *
 * Plugin settings are the file's `[settings]` table overlaid with the
 * environment, so a plugin reads `AUTH_TOKEN` the same way whether it was
 * exported or written in the file.
 *
 * @throws ConfigurationError on a bad flag, an unreadable or malformed
 *   file, a value that fails the schema, or a unix network without an address.
 */
export function loadConfig(sources: ConfigSources = {}): RuntimeConfig {
  const env = sources.env ?? process.env;
  const readFile = sources.readFile ?? ((path: string) => readFileSync(path, 'utf-8'));
  const args = parseServeArgs(sources.argv ?? []);

  const configFile = env['PLUGIN_CONFIG_FILE'];
  const file =
    configFile !== undefined && configFile.length > 0 ? readConfigFile(configFile, readFile) : {};

  const serverOverrides: Record<string, unknown> = {};
  for (const [variable, key, kind] of SERVER_ENV) {
    const value = env[variable];
    if (value === undefined || value.length === 0) continue;
    serverOverrides[key] = kind === 'number' ? toNumber(value) : value;
  }
  if (args.address !== undefined) serverOverrides['address'] = args.address;
  if (args.network !== undefined) serverOverrides['network'] = args.network;

  const loggingOverrides: Record<string, unknown> = {};
  const level = env['PLUGIN_LOG_LEVEL'];
  if (level !== undefined && level.length > 0) loggingOverrides['level'] = level;

  const envSettings: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) envSettings[key] = value;
  }

  const raw: Record<string, unknown> = {
    ...file,
    server: overlay(file['server'], serverOverrides),
    logging: overlay(file['logging'], loggingOverrides),
    settings: overlay(file['settings'], envSettings),
  };
  if (raw['server'] === undefined) delete raw['server'];
  if (raw['logging'] === undefined) delete raw['logging'];
  if (raw['settings'] === undefined) delete raw['settings'];

  const result = validator.validate('config', raw);
  if (!result.valid) {
    throw new ConfigurationError(
      formatErrorMessage({
        component: 'config',
        what: `invalid configuration (${result.errors.join('; ')})`,
        how: 'check the PLUGIN_* environment variables and the PLUGIN_CONFIG_FILE contents',
      }),
    );
  }

  const config = parseConfig(raw);
  if (config.server.network === 'unix' && config.server.address === undefined) {
    throw new ConfigurationError(
      formatErrorMessage({
        component: 'config',
        what: 'the unix network needs a socket path',
        how: 'pass --address <path> or set PLUGIN_ADDRESS',
      }),
      { field: 'address' },
    );
  }
  return config;
}
