import { describe, it, expect, vi } from 'vitest';
import { createLoggerAdapter, formatTemplate } from '../../../../src/shared/logger/logger-adapter';
import type { LogSink } from '../../../../src/shared/logger/logger-adapter';

function makeSink() {
  const info = vi.fn<LogSink['info']>();
  const error = vi.fn<LogSink['error']>();
  return { sink: { info, error } satisfies LogSink, info, error };
}

describe('formatTemplate', () => {
  it('replaces positional placeholders with their arguments', () => {
    expect(formatTemplate('User with id {0} retrieved in {1}ms', ['abc', 12])).toBe(
      'User with id abc retrieved in 12ms',
    );
  });

  it('leaves placeholders without a matching argument untouched', () => {
    expect(formatTemplate('Creating user with id {0} and name: {1}', ['abc'])).toBe(
      'Creating user with id abc and name: {1}',
    );
  });

  it('renders objects as JSON and null as text', () => {
    expect(formatTemplate('{0} / {1}', [{ a: 1 }, null])).toBe('{"a":1} / null');
  });

  it('falls back to String() for objects JSON cannot serialize', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(formatTemplate('{0} and {1}', [circular, { n: 1n }])).toBe(
      '[object Object] and [object Object]',
    );
  });
});

describe('createLoggerAdapter', () => {
  it('writes rendered info lines with component, template and args', () => {
    const { sink, info } = makeSink();
    const log = createLoggerAdapter('UserService', sink);

    log.info('Deleting user with id: {0}', 'u-1');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('Deleting user with id: u-1', {
      component: 'UserService',
      template: 'Deleting user with id: {0}',
      args: ['u-1'],
    });
  });

  it('writes error lines with the serialized exception', () => {
    const { sink, error } = makeSink();
    const log = createLoggerAdapter('UserService', sink);
    const failure = new Error('DB Exception');

    log.error(failure, 'Something went wrong while deleting user with id {0}', 'u-1');

    expect(error).toHaveBeenCalledWith('Something went wrong while deleting user with id u-1', {
      component: 'UserService',
      template: 'Something went wrong while deleting user with id {0}',
      args: ['u-1'],
      err: { name: 'Error', message: 'DB Exception', stack: failure.stack },
    });
  });

  it('does not throw when an argument cannot be serialized', () => {
    const { sink, info } = makeSink();
    const log = createLoggerAdapter('UserService', sink);
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => log.info('Creating user {0}', circular)).not.toThrow();
    expect(info).toHaveBeenCalledWith('Creating user [object Object]', {
      component: 'UserService',
      template: 'Creating user {0}',
      args: [circular],
    });
  });

  it('passes non-Error values through as-is', () => {
    const { sink, error } = makeSink();
    const log = createLoggerAdapter('UserService', sink);

    log.error('plain failure', 'Something went wrong while creating a user');

    expect(error).toHaveBeenCalledWith('Something went wrong while creating a user', {
      component: 'UserService',
      template: 'Something went wrong while creating a user',
      args: [],
      err: 'plain failure',
    });
  });
});
