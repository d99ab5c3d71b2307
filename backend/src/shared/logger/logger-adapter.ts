/**
 * backend/src/shared/logger/logger-adapter.ts
 *
 * WHY:
 * - Services log with message templates ("User with id {0} retrieved in {1}ms")
 *   instead of calling winston directly.
 * - Gives services a small interface they own, so tests can swap in a recording fake.
 *
 * HOW TO USE:
 * - `createLoggerAdapter('UserService')` once in the module wiring.
 * - `log.info('Deleting user with id: {0}', id)`
 * - `log.error(err, 'Something went wrong while deleting user with id {0}', id)`
 *
 * RULES:
 * - Fire-and-forget: no return value, never throws back into the caller.
 * - The template is kept in meta next to the rendered message so lines can be grouped.
 */

import { logger } from './logger';

export interface LoggerAdapter {
  info(template: string, ...args: unknown[]): void;
  error(err: unknown, template: string, ...args: unknown[]): void;
}

/**
 * The subset of a winston logger the adapter writes to.
 */
export type LogSink = {
  info(message: string, meta: Record<string, unknown>): unknown;
  error(message: string, meta: Record<string, unknown>): unknown;
};

const PLACEHOLDER = /\{(\d+)\}/g;

function renderArg(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  if (value === null || typeof value !== 'object') return String(value);

  // circular structures and nested bigints make JSON.stringify throw
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * Replaces `{n}` with the n-th argument. Placeholders without a matching
 * argument are left untouched.
 */
export function formatTemplate(template: string, args: readonly unknown[]): string {
  return template.replace(PLACEHOLDER, (match: string, index: string) => {
    const position = Number(index);
    return position < args.length ? renderArg(args[position]) : match;
  });
}

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;

  const out: Record<string, unknown> = {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };

  if ('code' in err) out.code = err.code;
  return out;
}

export function createLoggerAdapter(component: string, sink: LogSink = logger): LoggerAdapter {
  return {
    info(template, ...args) {
      sink.info(formatTemplate(template, args), { component, template, args });
    },

    error(err, template, ...args) {
      sink.error(formatTemplate(template, args), {
        component,
        template,
        args,
        err: serializeError(err),
      });
    },
  };
}
