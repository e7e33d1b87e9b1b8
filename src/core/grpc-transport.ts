/**
 * gRPC transport: serves the `plugin.v1.Plugin` service with @grpc/grpc-js.
 *
 * The service definition is loaded at run time from
 * proto/plugin/v1/plugin.proto with @grpc/proto-loader; nothing is
 * generated at build time. Each unary call is handed to the server's
 * CallHandler as an InboundCall, and rejections are mapped onto gRPC
 * status codes here.
 */

import { fileURLToPath } from 'node:url';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import type { ErrorCodeValue } from '../types/errors.js';
import { ErrorCode } from '../types/errors.js';
import { RPC_METHODS, type CallHandler, type RpcTransport } from '../types/transport.js';
import { CancelledError, isPluginError } from './plugin-error.js';

// ---------------------------------------------------------------------------
// Service definition
// ---------------------------------------------------------------------------

export const PROTO_PATH = fileURLToPath(
  new URL('../../proto/plugin/v1/plugin.proto', import.meta.url),
);

/** Fully qualified service name, as in the .proto package. */
export const SERVICE_NAME = 'plugin.v1.Plugin';

/** Options the wire codec relies on (snake_case keys, enum names, absent unset fields). */
export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: false,
  arrays: true,
  objects: true,
  oneofs: true,
};

let cachedService: grpc.ServiceDefinition | null = null;

function isServiceClientConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value;
}

function lookup(root: grpc.GrpcObject, path: readonly string[]): unknown {
  let node: unknown = root;
  for (const segment of path) {
    if (node === null || (typeof node !== 'object' && typeof node !== 'function')) return undefined;
    node = Reflect.get(node, segment);
  }
  return node;
}

/** Load (once) the `plugin.v1.Plugin` service definition. */
export function loadPluginService(): grpc.ServiceDefinition {
  if (cachedService !== null) return cachedService;

  const packageDefinition = protoLoader.loadSync(PROTO_PATH, PROTO_LOADER_OPTIONS);
  const ctor = lookup(grpc.loadPackageDefinition(packageDefinition), SERVICE_NAME.split('.'));
  if (!isServiceClientConstructor(ctor)) {
    throw new Error(`${SERVICE_NAME} not found in ${PROTO_PATH}`);
  }
  cachedService = ctor.service;
  return cachedService;
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

const STATUS_BY_CODE: Record<ErrorCodeValue, grpc.status> = {
  [ErrorCode.CONFIGURATION_ERROR]: grpc.status.FAILED_PRECONDITION,
  [ErrorCode.BIND_ERROR]: grpc.status.UNAVAILABLE,
  [ErrorCode.PROTOCOL_ERROR]: grpc.status.INVALID_ARGUMENT,
  [ErrorCode.HANDLER_ERROR]: grpc.status.INTERNAL,
  [ErrorCode.TIMEOUT]: grpc.status.DEADLINE_EXCEEDED,
  [ErrorCode.CANCELLED]: grpc.status.CANCELLED,
  [ErrorCode.UNAVAILABLE]: grpc.status.UNAVAILABLE,
};

/**
 * Map a rejection from the call handler to a gRPC status. Anything that is
 * not a PluginError is reported as INTERNAL without its message.
 */
export function toStatus(error: unknown): Partial<grpc.StatusObject> {
  if (isPluginError(error)) {
    return { code: STATUS_BY_CODE[error.code], details: error.message };
  }
  return { code: grpc.status.INTERNAL, details: 'internal error' };
}

function toEpochMs(deadline: Date | number): number | undefined {
  const ms = deadline instanceof Date ? deadline.getTime() : deadline;
  return Number.isFinite(ms) ? ms : undefined;
}

/** Replace the port of a `host:port` address with the port actually bound. */
export function withBoundPort(address: string, port: number): string {
  if (address.startsWith('unix:')) return address;
  const colon = address.lastIndexOf(':');
  return colon === -1 ? `${address}:${port}` : `${address.slice(0, colon)}:${port}`;
}

// ---------------------------------------------------------------------------
// GrpcTransport
// ---------------------------------------------------------------------------

export class GrpcTransport implements RpcTransport {
  private server: grpc.Server | null = null;

  bind(address: string, handler: CallHandler): Promise<string> {
    if (this.server !== null) {
      return Promise.reject(new Error('transport is already bound'));
    }

    const server = new grpc.Server();
    server.addService(loadPluginService(), this.implementation(handler));
    this.server = server;

    return new Promise<string>((resolve, reject) => {
      server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, port) => {
        if (error) {
          this.server = null;
          server.forceShutdown();
          reject(error);
          return;
        }
        resolve(withBoundPort(address, port));
      });
    });
  }

  shutdown(): Promise<void> {
    const server = this.server;
    if (server === null) return Promise.resolve();
    this.server = null;

    return new Promise<void>((resolve, reject) => {
      server.tryShutdown((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  forceShutdown(): void {
    this.server?.forceShutdown();
    this.server = null;
  }

  private implementation(handler: CallHandler): grpc.UntypedServiceImplementation {
    const implementation: grpc.UntypedServiceImplementation = {};

    for (const method of RPC_METHODS) {
      implementation[method] = (
        call: grpc.ServerUnaryCall<unknown, unknown>,
        callback: grpc.sendUnaryData<unknown>,
      ): void => {
        const controller = new AbortController();
        call.on('cancelled', () => {
          controller.abort(new CancelledError('call cancelled by the host'));
        });

        void handler({
          method,
          request: call.request,
          signal: controller.signal,
          deadline: toEpochMs(call.getDeadline()),
          peer: call.getPeer(),
        }).then(
          (response) => callback(null, response),
          (error: unknown) => callback(toStatus(error)),
        );
      };
    }

    return implementation;
  }
}
