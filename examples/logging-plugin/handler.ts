/**
 * Logging plugin: records both stages of every exchange and never
 * changes anything.
 *
 * Credential-bearing headers are redacted before they reach the log. The
 * plugin is fail-open on both stages, since an observability plugin must
 * not break traffic. A Mutex-guarded counter numbers the exchanges across
 * concurrent calls.
 *
 * A plugin's main module hands an instance to `serve()`:
 *   serve(new LoggingPlugin()).then((code) => { process.exitCode = code; });
 */

import {
  Mutex,
  continueUnchanged,
  type CallContext,
  type Decision,
  type DescriptorInput,
  type HeaderList,
  type Plugin,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../../src/index.js';

export const REDACTED = '***REDACTED***';

const REDACTED_HEADERS = new Set(['authorization', 'cookie']);

/** Flatten headers for logging, masking credentials. */
export function redactHeaders(headers: HeaderList): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of headers) {
    result[entry.name] = REDACTED_HEADERS.has(entry.name.toLowerCase())
      ? REDACTED
      : entry.values.join(', ');
  }
  return result;
}

export class LoggingPlugin implements Plugin {
  private readonly mutex = new Mutex();
  private requests = 0;
  private responses = 0;

  describe(): DescriptorInput {
    return {
      name: 'logging-plugin',
      version: '1.0.0',
      description: 'Logs HTTP request and response details for observability',
      failurePolicy: 'fail-open',
      stages: ['request', 'response'],
    };
  }

  /** Exchanges seen so far, per stage. */
  get counts(): { requests: number; responses: number } {
    return { requests: this.requests, responses: this.responses };
  }

  async handleRequest(envelope: RequestEnvelope, ctx: CallContext): Promise<Decision<RequestEnvelope>> {
    const seq = await this.mutex.runExclusive(() => ++this.requests);
    ctx.logger.info('incoming request', {
      seq,
      http_method: envelope.method,
      url: envelope.url,
      path: envelope.path,
      remote_addr: envelope.remoteAddr,
      headers: redactHeaders(envelope.headers),
      body_bytes: envelope.body.length,
    });
    return continueUnchanged();
  }

  async handleResponse(envelope: ResponseEnvelope, ctx: CallContext): Promise<Decision<ResponseEnvelope>> {
    const seq = await this.mutex.runExclusive(() => ++this.responses);
    ctx.logger.info('outgoing response', {
      seq,
      status_code: envelope.statusCode,
      headers: redactHeaders(envelope.headers),
      body_bytes: envelope.body.length,
    });
    return continueUnchanged();
  }
}
