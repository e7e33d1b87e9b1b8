export {
  STAGES,
  MIN_HTTP_STATUS,
  MAX_HTTP_STATUS,
  DEFAULT_FAILURE_POLICY,
  type Stage,
  type FailurePolicy,
  type HeaderEntry,
  type HeaderList,
  type EnvelopeBase,
  type RequestEnvelope,
  type ResponseEnvelope,
  type Envelope,
  type EnvelopeFor,
  type ContinueDecision,
  type ShortCircuitDecision,
  type Decision,
} from './protocol.js';

export {
  ErrorCode,
  FATAL_ERROR_CODES,
  POLICY_ERROR_CODES,
  type ErrorCodeValue,
  type ErrorPayload,
} from './errors.js';

export {
  type StageDeclarationInput,
  type DescriptorInput,
  type StageDeclaration,
  type PluginMetadata,
  type CapabilityDescriptor,
} from './descriptor.js';

export { DESCRIPTOR_JSON_SCHEMA } from './descriptor-schema.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_PORT,
  CONFIG_JSON_SCHEMA,
  type Network,
  type ServerSection,
  type LoggingSection,
  type PluginSettings,
  type RuntimeConfig,
} from './config.js';

export {
  RPC_METHODS,
  type RpcMethod,
  type InboundCall,
  type CallHandler,
  type RpcTransport,
} from './transport.js';
