/**
 * Exchange dispatch for the plugin runtime.
 *
 * Wraps every stage handler invocation with:
 * - Envelope validation and stage routing (→ ProtocolError, handler never runs)
 * - Deadline enforcement (→ TimeoutError, signal aborted)
 * - Decision validation (invalid decision → HandlerError)
 * - The stage's failure policy for POLICY_ERROR_CODES; other throws become HandlerError
 * - Host cancellation (→ CancelledError, result abandoned)
 * - Deferred cleanups, run last-in first-out once the call settles
 */

import { randomUUID } from 'node:crypto';
import type { CapabilityDescriptor } from '../types/descriptor.js';
import { MAX_TIMEOUT_MS, type PluginSettings } from '../types/config.js';
import { ErrorCode, POLICY_ERROR_CODES } from '../types/errors.js';
import type { Decision, Envelope, FailurePolicy, Stage } from '../types/protocol.js';
import { continueUnchanged, isDecision, shortCircuitJson, validateDecision, validateEnvelope } from './decision.js';
import { findStage } from './descriptor.js';
import { cloneEnvelope, envelopesEqual } from './envelope.js';
import { createLogger, type Logger } from './logger.js';
import {
  CancelledError,
  HandlerError,
  ProtocolError,
  TimeoutError,
  errorMessage,
  isPluginError,
  type PluginError,
} from './plugin-error.js';
import { STAGE_HANDLER_NAMES, type CallContext, type Cleanup, type Plugin } from './plugin.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ExchangeDispatcherOptions {
  plugin: Plugin;
  descriptor: CapabilityDescriptor;
  settings: PluginSettings;
  /** Upper bound on one handler invocation. */
  callTimeoutMs: number;
  logger?: Logger;
}

/** Per-call inputs supplied by the server. */
export interface DispatchOptions {
  callId?: string;
  /** Aborted when the host cancels the call or shutdown stops waiting for it. */
  signal?: AbortSignal;
  /** Host deadline in epoch milliseconds; caps `callTimeoutMs` when earlier. */
  deadline?: number;
  /** Transport address of the host, added to the call's log entries. */
  peer?: string;
}

/** Bodies of the synthesized fail-closed responses. */
export const FAIL_CLOSED_STATUS = 500;
export const FAIL_CLOSED_MESSAGE = 'plugin handler failed';
export const FAIL_CLOSED_TIMEOUT_MESSAGE = 'plugin handler timed out';

// ---------------------------------------------------------------------------
// ExchangeDispatcher
// ---------------------------------------------------------------------------

export class ExchangeDispatcher {
  private readonly plugin: Plugin;
  private readonly descriptor: CapabilityDescriptor;
  private readonly settings: PluginSettings;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ExchangeDispatcherOptions) {
    this.plugin = options.plugin;
    this.descriptor = options.descriptor;
    this.settings = options.settings;
    this.callTimeoutMs = options.callTimeoutMs;
    this.logger = options.logger ?? createLogger('dispatch');
  }

  /**
   * Run the handler for `stage` against `envelope` and produce the Decision
   * sent back to the host.
   *
   * @throws ProtocolError if the stage is not declared or the envelope is malformed.
   * @throws CancelledError if `options.signal` aborts before the handler settles.
   */
  async dispatch(stage: Stage, envelope: Envelope, options: DispatchOptions = {}): Promise<Decision> {
    const declaration = findStage(this.descriptor, stage);
    if (declaration === undefined) {
      throw new ProtocolError(
        `stage "${stage}" is not declared by plugin "${this.descriptor.name}"`,
        { field: 'flow' },
      );
    }
    validateEnvelope(envelope, stage);

    if (options.signal?.aborted) {
      throw new CancelledError('call was cancelled before dispatch');
    }

    const callId = options.callId ?? randomUUID();
    const logger = this.logger.withContext({ call: callId, stage });
    const timeoutMs = this.effectiveTimeout(options.deadline);
    const controller = new AbortController();
    const cleanups: Cleanup[] = [];
    let settled = false;

    const ctx: CallContext = {
      callId,
      stage,
      signal: controller.signal,
      deadline: Date.now() + timeoutMs,
      settings: this.settings,
      logger,
      defer: (cleanup) => {
        if (settled) {
          // Registered after the call settled (e.g. by a timed-out handler).
          void runCleanups([cleanup], logger);
          return;
        }
        cleanups.push(cleanup);
      },
    };

    const peer = options.peer === undefined ? {} : { peer: options.peer };
    const started = performance.now();
    try {
      const result = await this.execute(cloneEnvelope(envelope), ctx, controller, timeoutMs, options.signal);
      const decision = this.checkDecision(result, stage);
      const normalized = collapseUnchanged(decision, envelope);
      logger.info('exchange handled', {
        duration_ms: elapsed(started),
        ok: true,
        decision: describeDecision(normalized),
        ...peer,
      });
      return normalized;
    } catch (error: unknown) {
      if (error instanceof CancelledError) {
        logger.info('exchange cancelled', {
          duration_ms: elapsed(started),
          ok: false,
          error_code: error.code,
          ...peer,
        });
        throw error;
      }
      return this.applyPolicy(declaration.failurePolicy, toPolicyError(error, stage), logger, started, peer);
    } finally {
      settled = true;
      await runCleanups(cleanups, logger);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private effectiveTimeout(deadline: number | undefined): number {
    const limit = Math.min(this.callTimeoutMs, MAX_TIMEOUT_MS);
    if (deadline === undefined || !Number.isFinite(deadline)) return limit;
    return Math.min(limit, deadline - Date.now());
  }

  /**
   * Race the handler against the deadline and the host's cancellation.
   * Whichever loses is abandoned; the handler sees it through `ctx.signal`.
   */
  private execute(
    envelope: Envelope,
    ctx: CallContext,
    controller: AbortController,
    timeoutMs: number,
    hostSignal: AbortSignal | undefined,
  ): Promise<unknown> {
    const label = STAGE_HANDLER_NAMES[ctx.stage];

    return new Promise<unknown>((resolve, reject) => {
      let done = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (action: () => void): void => {
        if (done) return;
        done = true;
        if (timer !== undefined) clearTimeout(timer);
        hostSignal?.removeEventListener('abort', onCancel);
        action();
      };

      const onTimeout = (): void => {
        const error = new TimeoutError(`${label}() did not complete within ${Math.max(timeoutMs, 0)}ms`);
        finish(() => {
          controller.abort(error);
          reject(error);
        });
      };

      function onCancel(): void {
        const error = new CancelledError('call was cancelled before the handler finished');
        finish(() => {
          controller.abort(error);
          reject(error);
        });
      }

      if (timeoutMs <= 0) {
        onTimeout();
        return;
      }

      timer = setTimeout(onTimeout, timeoutMs);
      hostSignal?.addEventListener('abort', onCancel, { once: true });

      void this.invoke(envelope, ctx).then(
        (value) => finish(() => resolve(value)),
        (error: unknown) => finish(() => reject(error)),
      );
    });
  }

  private async invoke(envelope: Envelope, ctx: CallContext): Promise<unknown> {
    if (envelope.stage === 'request') {
      const handler = this.plugin.handleRequest;
      if (handler === undefined) {
        throw new HandlerError('handleRequest() is not implemented');
      }
      return await handler.call(this.plugin, envelope, ctx);
    }

    const handler = this.plugin.handleResponse;
    if (handler === undefined) {
      throw new HandlerError('handleResponse() is not implemented');
    }
    return await handler.call(this.plugin, envelope, ctx);
  }

  private checkDecision(result: unknown, stage: Stage): Decision {
    const label = STAGE_HANDLER_NAMES[stage];
    if (!isDecision(result)) {
      throw new HandlerError(`${label}() did not return a Decision`);
    }
    try {
      validateDecision(result, stage);
    } catch (error: unknown) {
      throw new HandlerError(`${label}() returned an invalid decision: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return result;
  }

  private applyPolicy(
    policy: FailurePolicy,
    error: PluginError,
    logger: Logger,
    started: number,
    peer: { peer?: string },
  ): Decision {
    const timedOut = error.code === ErrorCode.TIMEOUT;
    logger.warn(timedOut ? 'handler timed out' : 'handler failed', {
      duration_ms: elapsed(started),
      ok: false,
      error_code: error.code,
      error: error.message,
      policy,
      ...peer,
    });

    if (policy === 'fail-open') {
      return continueUnchanged();
    }
    return shortCircuitJson(
      FAIL_CLOSED_STATUS,
      timedOut ? FAIL_CLOSED_TIMEOUT_MESSAGE : FAIL_CLOSED_MESSAGE,
    );
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function elapsed(started: number): number {
  return Math.round(performance.now() - started);
}

function toPolicyError(error: unknown, stage: Stage): PluginError {
  if (isPluginError(error) && POLICY_ERROR_CODES.has(error.code)) return error;
  const label = STAGE_HANDLER_NAMES[stage];
  const message = isPluginError(error)
    ? `${label}() raised ${error.code}: ${error.message}`
    : `${label}() threw: ${errorMessage(error)}`;
  return new HandlerError(message, { cause: error });
}

/** A mutation equal to the input is reported as no mutation. */
function collapseUnchanged(decision: Decision, original: Envelope): Decision {
  if (decision.continue && decision.mutated !== undefined && envelopesEqual(decision.mutated, original)) {
    return continueUnchanged();
  }
  return decision;
}

function describeDecision(decision: Decision): string {
  if (!decision.continue) return `short-circuit ${decision.status}`;
  return decision.mutated === undefined ? 'continue' : 'mutate';
}

async function runCleanups(cleanups: Cleanup[], logger: Logger): Promise<void> {
  for (let cleanup = cleanups.pop(); cleanup !== undefined; cleanup = cleanups.pop()) {
    try {
      await cleanup();
    } catch (error: unknown) {
      logger.error('deferred cleanup failed', { error: errorMessage(error) });
    }
  }
}
