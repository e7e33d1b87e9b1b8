/**
 * Helpers for reading and rewriting exchange envelopes.
 *
 * Header lookups are case-insensitive; header names keep the casing they
 * arrived with. None of these functions mutate their input: handlers build
 * a new envelope and return it in a `continueWith()` decision.
 */

import type { Envelope, HeaderEntry, HeaderList } from '../types/protocol.js';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ---------------------------------------------------------------------------
// Header reads
// ---------------------------------------------------------------------------

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** All values of a header, across repeated entries, in order. */
export function getHeaderValues(headers: HeaderList, name: string): string[] {
  const values: string[] = [];
  for (const entry of headers) {
    if (sameName(entry.name, name)) values.push(...entry.values);
  }
  return values;
}

/** First value of a header, or undefined when absent. */
export function getHeader(headers: HeaderList, name: string): string | undefined {
  return getHeaderValues(headers, name)[0];
}

export function hasHeader(headers: HeaderList, name: string): boolean {
  return headers.some((entry) => sameName(entry.name, name));
}

// ---------------------------------------------------------------------------
// Header writes (non-mutating)
// ---------------------------------------------------------------------------

function copyHeaders(headers: HeaderList): HeaderList {
  return headers.map((entry) => ({ name: entry.name, values: [...entry.values] }));
}

/**
 * Replace every value of a header. The first existing entry keeps its
 * position (and casing); later duplicates are dropped. A new header is
 * appended at the end.
 */
export function setHeader(headers: HeaderList, name: string, value: string | string[]): HeaderList {
  const values = Array.isArray(value) ? [...value] : [value];
  const result: HeaderList = [];
  let replaced = false;

  for (const entry of headers) {
    if (!sameName(entry.name, name)) {
      result.push({ name: entry.name, values: [...entry.values] });
    } else if (!replaced) {
      result.push({ name: entry.name, values });
      replaced = true;
    }
  }

  if (!replaced) result.push({ name, values });
  return result;
}

/** Add a value after any existing values of the header. */
export function appendHeader(headers: HeaderList, name: string, value: string): HeaderList {
  const result = copyHeaders(headers);
  const existing = result.find((entry) => sameName(entry.name, name));
  if (existing) {
    existing.values.push(value);
  } else {
    result.push({ name, values: [value] });
  }
  return result;
}

export function removeHeader(headers: HeaderList, name: string): HeaderList {
  return copyHeaders(headers).filter((entry) => !sameName(entry.name, name));
}

/** Build a HeaderList from a plain record, preserving key order. */
export function headersFromRecord(record: Record<string, string | string[]>): HeaderList {
  return Object.entries(record).map(
    ([name, value]): HeaderEntry => ({ name, values: Array.isArray(value) ? [...value] : [value] }),
  );
}

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------

/** Encode a string (or pass bytes through) as an envelope body. */
export function toBody(value: string | Uint8Array): Uint8Array {
  return typeof value === 'string' ? textEncoder.encode(value) : value;
}

/** Decode a body as UTF-8 text. */
export function textBody(body: Uint8Array): string {
  return textDecoder.decode(body);
}

/** Encode a JSON value as a body. */
export function jsonBody(value: unknown): Uint8Array {
  return textEncoder.encode(JSON.stringify(value));
}

// ---------------------------------------------------------------------------
// Cloning
// ---------------------------------------------------------------------------

/**
 * Deep copy of an envelope. Handlers receive a clone so that an in-place
 * mutation never leaks into the original the failure policy passes through.
 */
export function cloneEnvelope<E extends Envelope>(envelope: E): E {
  return {
    ...envelope,
    headers: copyHeaders(envelope.headers),
    body: envelope.body.slice(),
    metadata: { ...envelope.metadata },
  };
}

/** Structural equality of two envelopes (stage fields, headers in order, body bytes). */
export function envelopesEqual(a: Envelope, b: Envelope): boolean {
  if (a.stage !== b.stage) return false;
  if (a.stage === 'request' && b.stage === 'request') {
    if (
      a.method !== b.method ||
      a.url !== b.url ||
      a.path !== b.path ||
      a.requestUri !== b.requestUri ||
      a.remoteAddr !== b.remoteAddr
    ) {
      return false;
    }
  }
  if (a.stage === 'response' && b.stage === 'response' && a.statusCode !== b.statusCode) {
    return false;
  }

  if (a.headers.length !== b.headers.length) return false;
  for (let i = 0; i < a.headers.length; i++) {
    const left = a.headers[i];
    const right = b.headers[i];
    if (left === undefined || right === undefined) return false;
    if (left.name !== right.name || left.values.length !== right.values.length) return false;
    if (!left.values.every((value, j) => value === right.values[j])) return false;
  }

  if (a.body.length !== b.body.length) return false;
  for (let i = 0; i < a.body.length; i++) {
    if (a.body[i] !== b.body[i]) return false;
  }

  const aKeys = Object.keys(a.metadata);
  if (aKeys.length !== Object.keys(b.metadata).length) return false;
  return aKeys.every((key) => a.metadata[key] === b.metadata[key]);
}
