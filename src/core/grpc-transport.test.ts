import { describe, it, expect } from 'vitest';
import * as grpc from '@grpc/grpc-js';
import { loadPluginService, toStatus, withBoundPort, SERVICE_NAME } from './grpc-transport.js';
import {
  BindError,
  CancelledError,
  ConfigurationError,
  HandlerError,
  ProtocolError,
  TimeoutError,
  UnavailableError,
} from './plugin-error.js';
import { RPC_METHODS } from '../types/transport.js';

describe('loadPluginService', () => {
  it('defines every RPC the server routes', () => {
    const service = loadPluginService();
    expect(Object.keys(service).sort()).toEqual([...RPC_METHODS].sort());
    expect(service['HandleRequest']?.path).toBe(`/${SERVICE_NAME}/HandleRequest`);
  });

  it('returns the cached definition on later calls', () => {
    expect(loadPluginService()).toBe(loadPluginService());
  });
});

describe('toStatus', () => {
  it.each([
    [new ConfigurationError('c'), grpc.status.FAILED_PRECONDITION],
    [new BindError('b'), grpc.status.UNAVAILABLE],
    [new ProtocolError('p'), grpc.status.INVALID_ARGUMENT],
    [new HandlerError('h'), grpc.status.INTERNAL],
    [new TimeoutError('t'), grpc.status.DEADLINE_EXCEEDED],
    [new CancelledError('x'), grpc.status.CANCELLED],
    [new UnavailableError('u'), grpc.status.UNAVAILABLE],
  ])('maps %s', (error, code) => {
    expect(toStatus(error)).toEqual({ code, details: error.message });
  });

  it('hides the message of an unexpected error', () => {
    expect(toStatus(new Error('/etc/secret not found'))).toEqual({
      code: grpc.status.INTERNAL,
      details: 'internal error',
    });
  });
});

describe('withBoundPort', () => {
  it('replaces an ephemeral port', () => {
    expect(withBoundPort('127.0.0.1:0', 43210)).toBe('127.0.0.1:43210');
    expect(withBoundPort('[::]:0', 43210)).toBe('[::]:43210');
  });

  it('appends a port to a bare host', () => {
    expect(withBoundPort('localhost', 9000)).toBe('localhost:9000');
  });

  it('leaves unix addresses alone', () => {
    expect(withBoundPort('unix:/tmp/p.sock', 0)).toBe('unix:/tmp/p.sock');
  });
});
