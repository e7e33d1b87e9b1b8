/**
 * PluginError — structured error classes for the plugin runtime.
 *
 * Each subclass carries one ErrorCode. The runtime discriminates on the
 * code, never on the message: configuration and bind errors stop the
 * process at startup, protocol errors are reported to the host as a
 * failed call, and handler errors (including timeouts) are converted into
 * a Decision through the stage's failure policy.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ErrorCode, FATAL_ERROR_CODES } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Private symbol used to brand PluginError instances so the check survives
 * duplicate copies of this module in a plugin's dependency tree.
 */
const PLUGIN_ERROR_BRAND = Symbol.for('plugin-runtime.PluginError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PluginErrorOptions {
  /** Dotted path of the offending field. */
  field?: string;
  /** Underlying error. */
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export class PluginError extends Error {
  readonly code: ErrorCodeValue;
  readonly field?: string;

  /** @internal Brand for safe checks across module boundaries. */
  readonly [PLUGIN_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string, options?: PluginErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PluginError';
    this.code = code;
    if (options?.field !== undefined) {
      this.field = options.field;
    }
  }

  /** Whether this error is allowed to terminate the process. */
  get fatal(): boolean {
    return FATAL_ERROR_CODES.has(this.code);
  }

  /** Serializable form with no stack or cause. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = { code: this.code, message: this.message };
    if (this.field !== undefined) {
      payload.field = this.field;
    }
    return payload;
  }
}

// ---------------------------------------------------------------------------
// Subclasses
// ---------------------------------------------------------------------------

/** Invalid or missing setting, bad descriptor, or a declared stage without a handler. */
export class ConfigurationError extends PluginError {
  constructor(message: string, options?: PluginErrorOptions) {
    super(ErrorCode.CONFIGURATION_ERROR, message, options);
    this.name = 'ConfigurationError';
  }
}

/** The listen address could not be bound. */
export class BindError extends PluginError {
  constructor(message: string, options?: PluginErrorOptions) {
    super(ErrorCode.BIND_ERROR, message, options);
    this.name = 'BindError';
  }
}

/** An envelope or decision violates the protocol invariants. */
export class ProtocolError extends PluginError {
  constructor(message: string, options?: PluginErrorOptions) {
    super(ErrorCode.PROTOCOL_ERROR, message, options);
    this.name = 'ProtocolError';
  }
}

/** Plugin handler logic failed during a call. */
export class HandlerError extends PluginError {
  constructor(message: string, options?: PluginErrorOptions) {
    super(ErrorCode.HANDLER_ERROR, message, options);
    this.name = 'HandlerError';
  }
}

/**
 * The handler exceeded its deadline. Subclasses HandlerError so the
 * failure policy treats both the same way.
 */
export class TimeoutError extends HandlerError {
  override readonly code: ErrorCodeValue = ErrorCode.TIMEOUT;

  constructor(message: string, options?: PluginErrorOptions) {
    super(message, options);
    this.name = 'TimeoutError';
  }
}

/** The host cancelled the call; its result is abandoned. */
export class CancelledError extends PluginError {
  constructor(message: string, options?: PluginErrorOptions) {
    super(ErrorCode.CANCELLED, message, options);
    this.name = 'CancelledError';
  }
}

/** The server is not accepting calls (shutting down, stopped, unhealthy). */
export class UnavailableError extends PluginError {
  constructor(message: string, options?: PluginErrorOptions) {
    super(ErrorCode.UNAVAILABLE, message, options);
    this.name = 'UnavailableError';
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Safe type guard for PluginError instances. Checks instanceof for
 * same-module usage, then the brand symbol for copies loaded elsewhere.
 */
export function isPluginError(value: unknown): value is PluginError {
  if (value instanceof PluginError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    PLUGIN_ERROR_BRAND in value &&
    value[PLUGIN_ERROR_BRAND] === true
  );
}

/** Best-effort message extraction for logging arbitrary throws. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
