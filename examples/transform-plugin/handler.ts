/**
 * Transform plugin: stamps JSON request bodies with processing metadata.
 *
 * POST, PUT and PATCH requests whose Content-Type is JSON and whose body
 * is a JSON object get a `_metadata` field and a matching Content-Length.
 * A body that does not parse is answered with 400. Anything unexpected
 * falls through to the fail-open policy, so the request continues as sent.
 *
 * A plugin's main module hands an instance to `serve()`:
 *   serve(new TransformPlugin()).then((code) => { process.exitCode = code; });
 */

import {
  continueUnchanged,
  continueWith,
  getHeader,
  jsonBody,
  setHeader,
  shortCircuitJson,
  textBody,
  type CallContext,
  type Decision,
  type DescriptorInput,
  type Plugin,
  type RequestEnvelope,
} from '../../src/index.js';

export const PLUGIN_NAME = 'transform-plugin';
export const PLUGIN_VERSION = '1.0.0';

const TRANSFORMED_METHODS = new Set(['POST', 'PUT', 'PATCH']);

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class TransformPlugin implements Plugin {
  describe(): DescriptorInput {
    return {
      name: PLUGIN_NAME,
      version: PLUGIN_VERSION,
      description: 'Transforms JSON request bodies by adding metadata fields',
      stages: [{ stage: 'request', failurePolicy: 'fail-open' }],
    };
  }

  async handleRequest(envelope: RequestEnvelope, ctx: CallContext): Promise<Decision<RequestEnvelope>> {
    const contentType = getHeader(envelope.headers, 'Content-Type') ?? '';
    if (!TRANSFORMED_METHODS.has(envelope.method) || !contentType.includes('application/json')) {
      return continueUnchanged();
    }
    if (envelope.body.length === 0) {
      return continueUnchanged();
    }

    let data: unknown;
    try {
      data = JSON.parse(textBody(envelope.body));
    } catch (error: unknown) {
      ctx.logger.warn('rejecting unparseable JSON body', {
        error: error instanceof Error ? error.message : String(error),
      });
      return shortCircuitJson(400, 'Invalid JSON');
    }

    if (!isJsonObject(data)) {
      ctx.logger.debug('JSON body is not an object; skipping');
      return continueUnchanged();
    }

    const body = jsonBody({
      ...data,
      _metadata: {
        processed_by: PLUGIN_NAME,
        version: PLUGIN_VERSION,
        client_ip: envelope.remoteAddr ?? null,
      },
    });

    return continueWith({
      ...envelope,
      body,
      headers: setHeader(envelope.headers, 'Content-Length', String(body.length)),
    });
  }
}
