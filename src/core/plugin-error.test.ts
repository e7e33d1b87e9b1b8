import { describe, it, expect } from 'vitest';
import {
  PluginError,
  ConfigurationError,
  BindError,
  ProtocolError,
  HandlerError,
  TimeoutError,
  CancelledError,
  UnavailableError,
  isPluginError,
  errorMessage,
} from './plugin-error.js';
import { ErrorCode } from '../types/errors.js';

describe('PluginError subclasses', () => {
  it.each([
    [new ConfigurationError('x'), 'CONFIGURATION_ERROR', 'ConfigurationError'],
    [new BindError('x'), 'BIND_ERROR', 'BindError'],
    [new ProtocolError('x'), 'PROTOCOL_ERROR', 'ProtocolError'],
    [new HandlerError('x'), 'HANDLER_ERROR', 'HandlerError'],
    [new TimeoutError('x'), 'TIMEOUT', 'TimeoutError'],
    [new CancelledError('x'), 'CANCELLED', 'CancelledError'],
    [new UnavailableError('x'), 'UNAVAILABLE', 'UnavailableError'],
  ])('%s carries its code and name', (error, code, name) => {
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
    expect(error).toBeInstanceOf(PluginError);
    expect(error).toBeInstanceOf(Error);
  });

  it('TimeoutError is a HandlerError', () => {
    expect(new TimeoutError('slow')).toBeInstanceOf(HandlerError);
  });

  it('marks only configuration and bind errors as fatal', () => {
    expect(new ConfigurationError('x').fatal).toBe(true);
    expect(new BindError('x').fatal).toBe(true);
    expect(new ProtocolError('x').fatal).toBe(false);
    expect(new HandlerError('x').fatal).toBe(false);
    expect(new TimeoutError('x').fatal).toBe(false);
  });

  it('keeps the cause', () => {
    const cause = new Error('EADDRINUSE');
    const error = new BindError('could not bind', { cause });
    expect(error.cause).toBe(cause);
  });
});

describe('toErrorPayload', () => {
  it('includes the field when set', () => {
    const error = new ProtocolError('status_code out of range', { field: 'status_code' });

    expect(error.toErrorPayload()).toEqual({
      code: ErrorCode.PROTOCOL_ERROR,
      message: 'status_code out of range',
      field: 'status_code',
    });
  });

  it('omits field and cause otherwise', () => {
    const error = new HandlerError('boom', { cause: new Error('inner') });

    expect(error.toErrorPayload()).toEqual({ code: 'HANDLER_ERROR', message: 'boom' });
  });
});

describe('isPluginError', () => {
  it('accepts instances', () => {
    expect(isPluginError(new ProtocolError('x'))).toBe(true);
  });

  it('accepts branded objects from another module copy', () => {
    const foreign = { [Symbol.for('plugin-runtime.PluginError')]: true, code: 'PROTOCOL_ERROR' };
    expect(isPluginError(foreign)).toBe(true);
  });

  it('rejects plain errors and look-alikes', () => {
    expect(isPluginError(new Error('x'))).toBe(false);
    expect(isPluginError({ code: 'PROTOCOL_ERROR', message: 'x' })).toBe(false);
    expect(isPluginError(null)).toBe(false);
    expect(isPluginError('PROTOCOL_ERROR')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
