/**
 * Error taxonomy shared by the runtime, the transport and plugin authors.
 *
 * Every failure the runtime can report carries one of these codes. Only
 * CONFIGURATION_ERROR and BIND_ERROR are fatal, and only at startup; all
 * other codes are scoped to a single call.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  BIND_ERROR: 'BIND_ERROR',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  HANDLER_ERROR: 'HANDLER_ERROR',
  TIMEOUT: 'TIMEOUT',
  CANCELLED: 'CANCELLED',
  UNAVAILABLE: 'UNAVAILABLE',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Fatality
// ---------------------------------------------------------------------------

/** Codes allowed to terminate the plugin process. */
export const FATAL_ERROR_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.CONFIGURATION_ERROR,
  ErrorCode.BIND_ERROR,
]);

/**
 * Codes the dispatcher converts into a Decision through the stage's
 * failure policy instead of reporting them to the host.
 */
export const POLICY_ERROR_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.HANDLER_ERROR,
  ErrorCode.TIMEOUT,
]);

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Serializable description of an error, safe to log or send to the host. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  /** Dotted path of the offending field, for protocol and config errors. */
  field?: string;
}
