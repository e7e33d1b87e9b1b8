export const VERSION = '0.1.0';

export * from './plugin-api.js';

// Process entry point
export { serve, EXIT_OK, EXIT_FAILURE, SHUTDOWN_SIGNALS } from './serve.js';
export type { ServeDeps } from './serve.js';

// Server and transports, for hosts embedding a plugin in-process
export { PluginServer } from './core/server.js';
export type { ServerDeps, ServerState, StateChangeListener } from './core/server.js';
export { GrpcTransport, loadPluginService, PROTO_PATH, SERVICE_NAME } from './core/grpc-transport.js';
export { configureLogging, createLogger } from './core/logger.js';
export type { LogEntry, LogSink } from './core/logger.js';
export { loadConfig, parseServeArgs } from './core/config-loader.js';
export type { ConfigSources, ServeArgs } from './core/config-loader.js';
export { DEFAULT_CONFIG, DEFAULT_PORT } from './types/config.js';
export type { RuntimeConfig, ServerSection, LoggingSection, Network } from './types/config.js';
export type { CapabilityDescriptor, StageDeclaration, PluginMetadata } from './types/index.js';
export type { RpcTransport, RpcMethod, InboundCall, CallHandler } from './types/index.js';
