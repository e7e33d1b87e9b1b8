/**
 * Decision builders and validation.
 *
 * Every decision leaving the runtime passes `validateDecision()`, so an
 * invalid one is rejected before it reaches the wire. The builders run
 * the same checks at construction time, which surfaces mistakes inside
 * the handler that made them.
 */

import type {
  ContinueDecision,
  Decision,
  Envelope,
  HeaderList,
  ShortCircuitDecision,
  Stage,
} from '../types/protocol.js';
import { MAX_HTTP_STATUS, MIN_HTTP_STATUS } from '../types/protocol.js';
import { ProtocolError } from './plugin-error.js';
import { jsonBody, toBody } from './envelope.js';

// ---------------------------------------------------------------------------
// Status validation
// ---------------------------------------------------------------------------

export function isValidStatus(status: unknown): status is number {
  return (
    typeof status === 'number' &&
    Number.isInteger(status) &&
    status >= MIN_HTTP_STATUS &&
    status <= MAX_HTTP_STATUS
  );
}

function assertStatus(status: unknown, field: string): void {
  if (!isValidStatus(status)) {
    throw new ProtocolError(
      `${field} must be an integer between ${MIN_HTTP_STATUS} and ${MAX_HTTP_STATUS}, got ${String(status)}`,
      { field },
    );
  }
}

function assertHeaders(headers: HeaderList, field: string): void {
  headers.forEach((entry, index) => {
    if (entry.name.length === 0) {
      throw new ProtocolError(`header name must not be empty`, { field: `${field}[${index}]` });
    }
  });
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/** Let the envelope pass through unchanged. */
export function continueUnchanged(): ContinueDecision<never> {
  return { continue: true };
}

/** Let the transaction continue with a rewritten envelope. */
export function continueWith<E extends Envelope>(mutated: E): ContinueDecision<E> {
  validateEnvelopeShape(mutated, 'mutated');
  return { continue: true, mutated };
}

export interface ShortCircuitOptions {
  status: number;
  body?: string | Uint8Array;
  headers?: HeaderList;
}

/** Stop the transaction and answer with a synthesized response. */
export function shortCircuit(options: ShortCircuitOptions): ShortCircuitDecision {
  assertStatus(options.status, 'status');
  const decision: ShortCircuitDecision = { continue: false, status: options.status };
  if (options.body !== undefined) {
    decision.body = toBody(options.body);
  }
  if (options.headers !== undefined) {
    assertHeaders(options.headers, 'headers');
    decision.headers = options.headers;
  }
  return decision;
}

/** Short-circuit with a `{"error": message}` JSON body. */
export function shortCircuitJson(
  status: number,
  message: string,
  headers: HeaderList = [],
): ShortCircuitDecision {
  return shortCircuit({
    status,
    body: jsonBody({ error: message }),
    headers: [{ name: 'Content-Type', values: ['application/json'] }, ...headers],
  });
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateEnvelopeShape(envelope: Envelope, field: string): void {
  assertHeaders(envelope.headers, `${field}.headers`);
  if (envelope.stage === 'request') {
    if (envelope.method.length === 0) {
      throw new ProtocolError('request method must not be empty', { field: `${field}.method` });
    }
    if (envelope.url.length === 0) {
      throw new ProtocolError('request url must not be empty', { field: `${field}.url` });
    }
  } else {
    // Status mutation on a continue decision is allowed, within range.
    assertStatus(envelope.statusCode, `${field}.statusCode`);
  }
}

/**
 * Check an inbound envelope before any plugin code sees it.
 * Throws ProtocolError when it belongs to another stage or is malformed.
 */
export function validateEnvelope(envelope: Envelope, stage: Stage): void {
  if (envelope.stage !== stage) {
    throw new ProtocolError(
      `envelope is for stage "${envelope.stage}" but the call is for "${stage}"`,
      { field: 'envelope.stage' },
    );
  }
  validateEnvelopeShape(envelope, 'envelope');
}

/**
 * Check a decision against the protocol invariants for the stage it
 * answers. Throws ProtocolError on the first violation.
 */
export function validateDecision(decision: Decision, stage: Stage): void {
  if (decision.continue) {
    if (decision.mutated !== undefined) {
      if (decision.mutated.stage !== stage) {
        throw new ProtocolError(
          `mutated envelope is for stage "${decision.mutated.stage}" but the call is for "${stage}"`,
          { field: 'mutated.stage' },
        );
      }
      validateEnvelopeShape(decision.mutated, 'mutated');
    }
    return;
  }

  assertStatus(decision.status, 'status');
  if (decision.headers !== undefined) {
    assertHeaders(decision.headers, 'headers');
  }
}

/**
 * Narrow an untrusted handler return value to a Decision. Handlers are
 * typed, but plain-JavaScript plugins can return anything.
 */
export function isDecision(value: unknown): value is Decision {
  return (
    typeof value === 'object' &&
    value !== null &&
    'continue' in value &&
    typeof value.continue === 'boolean'
  );
}
