// Plugin-author public API. Plugins import from 'plugin-runtime'.

// Handler contract
export type {
  Plugin,
  CallContext,
  Cleanup,
  RequestHandler,
  ResponseHandler,
  ErrorMessageParts,
} from './core/plugin.js';

export { formatErrorMessage } from './core/plugin.js';

// Decisions
export {
  continueUnchanged,
  continueWith,
  shortCircuit,
  shortCircuitJson,
  isDecision,
} from './core/decision.js';
export type { ShortCircuitOptions } from './core/decision.js';

// Envelope helpers
export {
  getHeader,
  getHeaderValues,
  hasHeader,
  setHeader,
  appendHeader,
  removeHeader,
  headersFromRecord,
  toBody,
  textBody,
  jsonBody,
} from './core/envelope.js';

// Structured errors
export {
  PluginError,
  ConfigurationError,
  BindError,
  ProtocolError,
  HandlerError,
  TimeoutError,
  CancelledError,
  UnavailableError,
  isPluginError,
} from './core/plugin-error.js';
export type { PluginErrorOptions } from './core/plugin-error.js';

// Concurrency
export { Mutex } from './core/mutex.js';

// Logging
export type { Logger, LogLevel } from './core/logger.js';

// Protocol and descriptor types
export type {
  Stage,
  FailurePolicy,
  HeaderEntry,
  HeaderList,
  RequestEnvelope,
  ResponseEnvelope,
  Envelope,
  Decision,
  ContinueDecision,
  ShortCircuitDecision,
  DescriptorInput,
  StageDeclarationInput,
  PluginSettings,
  ErrorPayload,
} from './types/index.js';

// Error codes (runtime value)
export { ErrorCode } from './types/index.js';
export type { ErrorCodeValue } from './types/index.js';
