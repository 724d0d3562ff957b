import { describe, it, expect } from 'vitest';
import { DwnError, PartialStopFailure, errorMessage, hasErrorCode, isDwnError } from './dwn-error.js';
import { ErrorCode } from '../types/errors.js';

describe('DwnError', () => {
  it('carries code, context and the default retriable flag', () => {
    const err = new DwnError({
      code: ErrorCode.PORT_CONFLICT,
      message: 'Host port 8080/tcp is already in use',
      plan: 'nginx',
      container: { id: 'abc123', name: 'dwn_1a2b3c4d_nginx_net_80_8080' },
      operation: 'start',
    });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('DwnError');
    expect(err.code).toBe('PORT_CONFLICT');
    expect(err.retriable).toBe(false);
    expect(err.plan).toBe('nginx');
    expect(err.operation).toBe('start');
    expect(err.containerLabel).toBe('dwn_1a2b3c4d_nginx_net_80_8080');
  });

  it('lets callers override retriable', () => {
    const err = new DwnError({ code: ErrorCode.ENGINE_ERROR, message: 'boom', retriable: true });
    expect(err.retriable).toBe(true);
  });

  it('uses ERROR_RETRIABLE_DEFAULTS for unreachable engines', () => {
    const err = new DwnError({ code: ErrorCode.ENGINE_UNREACHABLE, message: 'down' });
    expect(err.retriable).toBe(true);
  });

  it('keeps the cause', () => {
    const cause = new Error('exit status 1');
    const err = new DwnError({ code: ErrorCode.ENGINE_ERROR, message: 'docker rm failed', cause });
    expect(err.cause).toBe(cause);
  });

  it('renders a string container as its label', () => {
    const err = new DwnError({ code: ErrorCode.CONTAINER_NOT_FOUND, message: 'gone', container: 'abc' });
    expect(err.containerLabel).toBe('abc');
  });

  it('has no container label without a container', () => {
    const err = new DwnError({ code: ErrorCode.PLAN_NOT_FOUND, message: 'nope' });
    expect(err.containerLabel).toBeUndefined();
  });
});

describe('PartialStopFailure', () => {
  it('names every failed container and its operation', () => {
    const failure = new DwnError({ code: ErrorCode.ENGINE_ERROR, message: 'simulated remove failure' });
    const err = new PartialStopFailure(
      'nginx',
      [{ id: 'a', name: 'dwn_1a2b3c4d_nginx' }],
      [{ container: { id: 'b', name: 'dwn_9f8e7d6c_nginx_net_80_9000' }, operation: 'remove', error: failure }],
    );

    expect(err.name).toBe('PartialStopFailure');
    expect(err.code).toBe('PARTIAL_STOP_FAILURE');
    expect(err.plan).toBe('nginx');
    expect(err.message).toBe(
      'Failed to stop 1 container(s) of plan "nginx": dwn_9f8e7d6c_nginx_net_80_9000 (remove)',
    );
    expect(err.stopped).toEqual([{ id: 'a', name: 'dwn_1a2b3c4d_nginx' }]);
    expect(err.failures[0]?.error).toBe(failure);
    expect(isDwnError(err)).toBe(true);
  });
});

describe('isDwnError', () => {
  it('accepts DwnError instances', () => {
    expect(isDwnError(new DwnError({ code: ErrorCode.ENGINE_ERROR, message: 'x' }))).toBe(true);
  });

  it('accepts branded objects from another module copy', () => {
    const foreign = { [Symbol.for('dwn.DwnError')]: true, code: 'ENGINE_ERROR' };
    expect(isDwnError(foreign)).toBe(true);
  });

  it('rejects plain errors and non-objects', () => {
    expect(isDwnError(new Error('x'))).toBe(false);
    expect(isDwnError(null)).toBe(false);
    expect(isDwnError('ENGINE_ERROR')).toBe(false);
  });
});

describe('hasErrorCode', () => {
  it('matches on code', () => {
    const err = new DwnError({ code: ErrorCode.NAME_CONFLICT, message: 'taken' });
    expect(hasErrorCode(err, ErrorCode.NAME_CONFLICT)).toBe(true);
    expect(hasErrorCode(err, ErrorCode.PORT_CONFLICT)).toBe(false);
    expect(hasErrorCode(new Error('taken'), ErrorCode.NAME_CONFLICT)).toBe(false);
  });
});

describe('errorMessage', () => {
  it('renders errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
