/**
 * Auth plugin: rejects requests without the expected bearer token.
 *
 * The token comes from the `AUTH_TOKEN` setting (environment or the
 * config file's `[settings]` table); the plugin refuses to start without
 * it. Rejections are 401 JSON responses carrying `WWW-Authenticate: Bearer`.
 *
 * A plugin's main module hands an instance to `serve()`:
 *   serve(new AuthPlugin()).then((code) => { process.exitCode = code; });
 */

import { timingSafeEqual } from 'node:crypto';
import {
  ConfigurationError,
  continueUnchanged,
  formatErrorMessage,
  getHeader,
  shortCircuitJson,
  type CallContext,
  type Decision,
  type DescriptorInput,
  type Plugin,
  type PluginSettings,
  type RequestEnvelope,
} from '../../src/index.js';

const BEARER_PREFIX = 'Bearer ';

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function unauthorized(message: string): Decision<RequestEnvelope> {
  return shortCircuitJson(401, message, [{ name: 'WWW-Authenticate', values: ['Bearer'] }]);
}

export class AuthPlugin implements Plugin {
  private expectedToken = '';

  init(settings: PluginSettings): void {
    const token = settings['AUTH_TOKEN'];
    if (token === undefined || token.length === 0) {
      throw new ConfigurationError(
        formatErrorMessage({
          component: 'auth-plugin',
          what: 'AUTH_TOKEN is not set',
          how: 'export AUTH_TOKEN or set it under [settings] in the PLUGIN_CONFIG_FILE',
        }),
        { field: 'AUTH_TOKEN' },
      );
    }
    this.expectedToken = token;
  }

  describe(): DescriptorInput {
    return {
      name: 'auth-plugin',
      version: '1.0.0',
      description: 'Validates Bearer token authentication',
      stages: [{ stage: 'request', failurePolicy: 'fail-closed' }],
    };
  }

  async handleRequest(envelope: RequestEnvelope, ctx: CallContext): Promise<Decision<RequestEnvelope>> {
    const header = getHeader(envelope.headers, 'Authorization') ?? '';

    if (!header.startsWith(BEARER_PREFIX)) {
      ctx.logger.warn('missing or invalid Authorization header', { url: envelope.url });
      return unauthorized('Missing or invalid Authorization header');
    }

    if (!tokensMatch(header.slice(BEARER_PREFIX.length), this.expectedToken)) {
      ctx.logger.warn('invalid token', { url: envelope.url });
      return unauthorized('Invalid token');
    }

    ctx.logger.debug('authenticated', { url: envelope.url });
    return continueUnchanged();
  }
}
