/**
 * Wire codec: protobuf message objects ↔ domain types.
 *
 * The transport loads proto/plugin/v1/plugin.proto at run time with
 * `keepCase`, `enums: String` and `defaults: false`, so inbound messages
 * arrive as plain objects with snake_case keys, enum names as strings and
 * unset fields absent. Decoding treats them as untrusted input and narrows
 * every field; anything that violates the envelope invariants is a
 * ProtocolError and never reaches plugin code.
 */

import type { CapabilityDescriptor, PluginMetadata } from '../types/descriptor.js';
import type {
  Decision,
  Envelope,
  FailurePolicy,
  HeaderList,
  RequestEnvelope,
  ResponseEnvelope,
  Stage,
} from '../types/protocol.js';
import { isValidStatus } from './decision.js';
import { ProtocolError } from './plugin-error.js';

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

export type WireFlow = 'FLOW_UNSPECIFIED' | 'FLOW_REQUEST' | 'FLOW_RESPONSE';

export type WireFailurePolicy =
  | 'FAILURE_POLICY_UNSPECIFIED'
  | 'FAILURE_POLICY_FAIL_CLOSED'
  | 'FAILURE_POLICY_FAIL_OPEN';

export interface WireHeader {
  name: string;
  values: string[];
}

export interface WireExchange {
  flow: WireFlow;
  method?: string;
  url?: string;
  path?: string;
  status_code?: number;
  headers: WireHeader[];
  body: Uint8Array;
  metadata: Record<string, string>;
  remote_addr?: string;
  request_uri?: string;
}

export interface WireDecision {
  continue: boolean;
  modified?: WireExchange;
  status_code?: number;
  body?: Uint8Array;
  headers?: WireHeader[];
}

export interface WireMetadata {
  name: string;
  version: string;
  description: string;
}

export interface WireStageCapability {
  flow: WireFlow;
  failure_policy: WireFailurePolicy;
}

export interface WireCapabilities {
  flows: WireFlow[];
  stages: WireStageCapability[];
}

export interface WireDescriptor {
  metadata: WireMetadata;
  capabilities: WireCapabilities;
}

// ---------------------------------------------------------------------------
// Enum mapping
// ---------------------------------------------------------------------------

const STAGE_TO_FLOW: Record<Stage, WireFlow> = {
  request: 'FLOW_REQUEST',
  response: 'FLOW_RESPONSE',
};

const POLICY_TO_WIRE: Record<FailurePolicy, WireFailurePolicy> = {
  'fail-closed': 'FAILURE_POLICY_FAIL_CLOSED',
  'fail-open': 'FAILURE_POLICY_FAIL_OPEN',
};

export function stageToFlow(stage: Stage): WireFlow {
  return STAGE_TO_FLOW[stage];
}

/**
 * Map a wire `Flow` (name or number) to a stage. `undefined` means the
 * flow was left unspecified.
 */
export function flowToStage(flow: unknown): Stage | undefined {
  switch (flow) {
    case undefined:
    case null:
    case 0:
    case 'FLOW_UNSPECIFIED':
      return undefined;
    case 1:
    case 'FLOW_REQUEST':
      return 'request';
    case 2:
    case 'FLOW_RESPONSE':
      return 'response';
    default:
      throw new ProtocolError(`unknown flow ${JSON.stringify(flow)}`, { field: 'flow' });
  }
}

// ---------------------------------------------------------------------------
// Narrowing helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(message: Record<string, unknown>, field: string): string | undefined {
  const value = message[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ProtocolError(`${field} must be a string`, { field });
  }
  return value;
}

function requiredString(message: Record<string, unknown>, field: string, stage: Stage): string {
  const value = optionalString(message, field);
  if (value === undefined || value.length === 0) {
    throw new ProtocolError(`${stage} exchange is missing ${field}`, { field });
  }
  return value;
}

function decodeHeaders(value: unknown): HeaderList {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ProtocolError('headers must be a list', { field: 'headers' });
  }

  return value.map((entry: unknown, index) => {
    const field = `headers[${index}]`;
    if (!isRecord(entry)) {
      throw new ProtocolError('header must be a message', { field });
    }
    const name = entry['name'];
    if (typeof name !== 'string' || name.length === 0) {
      throw new ProtocolError('header name must be a non-empty string', { field });
    }
    const values: unknown = entry['values'] ?? [];
    if (!Array.isArray(values) || !values.every((v): v is string => typeof v === 'string')) {
      throw new ProtocolError('header values must be strings', { field });
    }
    return { name, values: [...values] };
  });
}

function decodeBody(value: unknown): Uint8Array {
  if (value === undefined || value === null) return new Uint8Array();
  if (!(value instanceof Uint8Array)) {
    throw new ProtocolError('body must be bytes', { field: 'body' });
  }
  // Copy out of the (possibly pooled) Buffer into a plain Uint8Array.
  return new Uint8Array(value);
}

function decodeMetadata(value: unknown): Record<string, string> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ProtocolError('metadata must be a map', { field: 'metadata' });
  }
  const entries: Array<[string, string]> = [];
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ProtocolError(`metadata "${key}" must be a string`, { field: `metadata.${key}` });
    }
    entries.push([key, entry]);
  }
  // fromEntries defines own properties, so a "__proto__" key survives.
  return Object.fromEntries(entries);
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/**
 * Decode an inbound Exchange for the stage fixed by the RPC method.
 *
 * An unspecified flow takes the method's stage; a contradicting flow is a
 * ProtocolError. Fields that don't apply to the stage are dropped.
 */
export function decodeExchange(raw: unknown, stage: Stage): Envelope {
  if (!isRecord(raw)) {
    throw new ProtocolError('exchange must be a message');
  }

  const flowStage = flowToStage(raw['flow']);
  if (flowStage !== undefined && flowStage !== stage) {
    throw new ProtocolError(
      `exchange flow is "${flowStage}" but it was sent to the ${stage} handler`,
      { field: 'flow' },
    );
  }

  const headers = decodeHeaders(raw['headers']);
  const body = decodeBody(raw['body']);
  const metadata = decodeMetadata(raw['metadata']);

  if (stage === 'request') {
    const envelope: RequestEnvelope = {
      stage,
      method: requiredString(raw, 'method', stage),
      url: requiredString(raw, 'url', stage),
      headers,
      body,
      metadata,
    };
    const path = optionalString(raw, 'path');
    const requestUri = optionalString(raw, 'request_uri');
    const remoteAddr = optionalString(raw, 'remote_addr');
    if (path !== undefined) envelope.path = path;
    if (requestUri !== undefined) envelope.requestUri = requestUri;
    if (remoteAddr !== undefined) envelope.remoteAddr = remoteAddr;
    return envelope;
  }

  const statusCode = raw['status_code'];
  if (statusCode === undefined || statusCode === null) {
    throw new ProtocolError('response exchange is missing status_code', { field: 'status_code' });
  }
  if (!isValidStatus(statusCode)) {
    throw new ProtocolError(
      `status_code must be an integer between 100 and 599, got ${String(statusCode)}`,
      { field: 'status_code' },
    );
  }
  const envelope: ResponseEnvelope = { stage, statusCode, headers, body, metadata };
  return envelope;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

function encodeHeaders(headers: HeaderList): WireHeader[] {
  return headers.map((entry) => ({ name: entry.name, values: [...entry.values] }));
}

export function encodeExchange(envelope: Envelope): WireExchange {
  const wire: WireExchange = {
    flow: stageToFlow(envelope.stage),
    headers: encodeHeaders(envelope.headers),
    body: envelope.body,
    metadata: { ...envelope.metadata },
  };

  if (envelope.stage === 'request') {
    wire.method = envelope.method;
    wire.url = envelope.url;
    if (envelope.path !== undefined) wire.path = envelope.path;
    if (envelope.requestUri !== undefined) wire.request_uri = envelope.requestUri;
    if (envelope.remoteAddr !== undefined) wire.remote_addr = envelope.remoteAddr;
  } else {
    wire.status_code = envelope.statusCode;
  }
  return wire;
}

export function encodeDecision(decision: Decision): WireDecision {
  if (decision.continue) {
    return decision.mutated === undefined
      ? { continue: true }
      : { continue: true, modified: encodeExchange(decision.mutated) };
  }

  const wire: WireDecision = { continue: false, status_code: decision.status };
  if (decision.body !== undefined) wire.body = decision.body;
  if (decision.headers !== undefined) wire.headers = encodeHeaders(decision.headers);
  return wire;
}

export function encodeMetadata(metadata: PluginMetadata): WireMetadata {
  return { name: metadata.name, version: metadata.version, description: metadata.description };
}

export function encodeCapabilities(descriptor: CapabilityDescriptor): WireCapabilities {
  return {
    flows: descriptor.stages.map((declaration) => stageToFlow(declaration.stage)),
    stages: descriptor.stages.map((declaration) => ({
      flow: stageToFlow(declaration.stage),
      failure_policy: POLICY_TO_WIRE[declaration.failurePolicy],
    })),
  };
}

export function encodeDescriptor(descriptor: CapabilityDescriptor): WireDescriptor {
  return {
    metadata: encodeMetadata(descriptor),
    capabilities: encodeCapabilities(descriptor),
  };
}
