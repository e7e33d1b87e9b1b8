/**
 * Plugin interfaces for plugin authors.
 *
 * A plugin declares its identity and stages through `describe()` and
 * implements one handler per declared stage. The runtime checks at
 * startup that every declared stage has its handler, so a plugin never
 * fails on its first call for a missing method.
 *
 * Lifecycle: `init` → `describe` → handlers (many, concurrent) → `shutdown`
 */

import type { DescriptorInput } from '../types/descriptor.js';
import type { PluginSettings } from '../types/config.js';
import type {
  Decision,
  RequestEnvelope,
  ResponseEnvelope,
  Stage,
} from '../types/protocol.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// CallContext
// ---------------------------------------------------------------------------

/** A cleanup registered with `CallContext.defer()`. */
export type Cleanup = () => void | Promise<void>;

/**
 * Per-call context passed to every stage handler.
 *
 * `signal` aborts when the call times out, when the host cancels it, or
 * when shutdown gives up on draining; handlers doing I/O should pass it
 * along. Cleanups registered with `defer()` run once, last-in first-out,
 * when the call settles, whichever way it settles.
 */
export interface CallContext {
  callId: string;
  stage: Stage;
  signal: AbortSignal;
  /** Epoch milliseconds after which the result will be discarded. */
  deadline: number;
  settings: PluginSettings;
  logger: Logger;
  defer(cleanup: Cleanup): void;
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export type RequestHandler = (
  envelope: RequestEnvelope,
  ctx: CallContext,
) => Promise<Decision<RequestEnvelope>>;

export type ResponseHandler = (
  envelope: ResponseEnvelope,
  ctx: CallContext,
) => Promise<Decision<ResponseEnvelope>>;

/** The contract every plugin implements. */
export interface Plugin {
  /** Identity, declared stages and failure policies. Called once at startup. */
  describe(): DescriptorInput | Promise<DescriptorInput>;

  /** Request-stage handler. Required when the `request` stage is declared. */
  handleRequest?: RequestHandler;

  /** Response-stage handler. Required when the `response` stage is declared. */
  handleResponse?: ResponseHandler;

  /**
   * Read settings once, before `describe()`. Throw (ideally a
   * ConfigurationError) when a required setting is missing.
   */
  init?(settings: PluginSettings): void | Promise<void>;

  /** Liveness probe; throw to report unhealthy. */
  checkHealth?(): void | Promise<void>;

  /** Readiness probe; throw to report not ready. */
  checkReady?(): void | Promise<void>;

  /** Release resources after the server stops accepting calls. */
  shutdown?(): void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Stage → handler lookup
// ---------------------------------------------------------------------------

/** Name of the Plugin method that handles each stage. */
export const STAGE_HANDLER_NAMES = {
  request: 'handleRequest',
  response: 'handleResponse',
} as const satisfies Record<Stage, keyof Plugin>;

/** Whether the plugin implements the handler for a stage. */
export function hasStageHandler(plugin: Plugin, stage: Stage): boolean {
  return typeof plugin[STAGE_HANDLER_NAMES[stage]] === 'function';
}

// ---------------------------------------------------------------------------
// Error message template
// ---------------------------------------------------------------------------

/**
 * Standard error message format for actionable developer errors.
 * Template: `[COMPONENT] Error: {what}. Fix: {how}.`
 */
export interface ErrorMessageParts {
  component: string;
  what: string;
  how: string;
}

export function formatErrorMessage(parts: ErrorMessageParts): string {
  return `[${parts.component}] Error: ${parts.what}. Fix: ${parts.how}.`;
}
