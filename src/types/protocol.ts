/**
 * Interception protocol types.
 *
 * Defines the stages a plugin can participate in, the exchange envelope
 * the host sends for each intercepted HTTP message, and the decision the
 * plugin returns. The protobuf messages in proto/plugin/v1/plugin.proto
 * are mapped onto these types by the wire codec.
 */

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/** Points in the HTTP transaction lifecycle where interception happens. */
export type Stage = 'request' | 'response';

/** Every stage, in the order the host invokes them for one transaction. */
export const STAGES: readonly Stage[] = ['request', 'response'] as const;

/** Valid HTTP status range for short-circuits and status mutations. */
export const MIN_HTTP_STATUS = 100;
export const MAX_HTTP_STATUS = 599;

// ---------------------------------------------------------------------------
// Failure policy
// ---------------------------------------------------------------------------

/**
 * What the runtime does when a stage handler throws or times out.
 *
 * - `fail-closed`: block the transaction with a synthesized 500.
 * - `fail-open`: pass the original envelope through unchanged.
 */
export type FailurePolicy = 'fail-closed' | 'fail-open';

export const DEFAULT_FAILURE_POLICY: FailurePolicy = 'fail-closed';

// ---------------------------------------------------------------------------
// Headers
// ---------------------------------------------------------------------------

/** One header name with all of its values, in arrival order. */
export interface HeaderEntry {
  name: string;
  values: string[];
}

/** Ordered, multi-valued header mapping. */
export type HeaderList = HeaderEntry[];

// ---------------------------------------------------------------------------
// Exchange envelopes
// ---------------------------------------------------------------------------

/** Fields shared by envelopes of every stage. */
export interface EnvelopeBase<S extends Stage> {
  stage: S;
  headers: HeaderList;
  body: Uint8Array;
  /** Opaque key/value context passed between plugins by the host. */
  metadata: Record<string, string>;
}

/** An intercepted request, before it reaches the upstream. */
export interface RequestEnvelope extends EnvelopeBase<'request'> {
  method: string;
  url: string;
  path?: string;
  requestUri?: string;
  remoteAddr?: string;
}

/** An upstream response, before it is returned to the client. */
export interface ResponseEnvelope extends EnvelopeBase<'response'> {
  statusCode: number;
}

/** Discriminated union of all envelope types. */
export type Envelope = RequestEnvelope | ResponseEnvelope;

/** Maps a stage to its envelope type. */
export type EnvelopeFor<S extends Stage> = Extract<Envelope, { stage: S }>;

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

/**
 * Let the transaction continue. `mutated` is present only when the plugin
 * changed the envelope; without it the original passes through unchanged.
 */
export interface ContinueDecision<E extends Envelope = Envelope> {
  continue: true;
  mutated?: E;
}

/** Stop the transaction and answer the client with a synthesized response. */
export interface ShortCircuitDecision {
  continue: false;
  status: number;
  body?: Uint8Array;
  headers?: HeaderList;
}

/** The plugin's verdict on one envelope. */
export type Decision<E extends Envelope = Envelope> = ContinueDecision<E> | ShortCircuitDecision;
