/**
 * Header plugin: minimal example that tags every request.
 *
 * Adds `X-Simple-Plugin: processed` and lets the request continue.
 *
 * A plugin's main module hands an instance to `serve()`:
 *   serve(new HeaderPlugin()).then((code) => { process.exitCode = code; });
 */

import {
  continueWith,
  setHeader,
  type Decision,
  type DescriptorInput,
  type Plugin,
  type RequestEnvelope,
} from '../../src/index.js';

export const HEADER_NAME = 'X-Simple-Plugin';

export class HeaderPlugin implements Plugin {
  describe(): DescriptorInput {
    return {
      name: 'header-plugin',
      version: '1.0.0',
      description: 'Adds a marker header to every request',
      stages: ['request'],
    };
  }

  async handleRequest(envelope: RequestEnvelope): Promise<Decision<RequestEnvelope>> {
    return continueWith({ ...envelope, headers: setHeader(envelope.headers, HEADER_NAME, 'processed') });
  }
}
