import type { LoggerAdapter } from '../../src/shared/logger/logger-adapter';

export type InfoEntry = { template: string; args: unknown[] };
export type ErrorEntry = { err: unknown; template: string; args: unknown[] };

/**
 * LoggerAdapter fake that keeps every call for assertions.
 */
export class RecordingLogger implements LoggerAdapter {
  readonly infos: InfoEntry[] = [];
  readonly errors: ErrorEntry[] = [];

  info(template: string, ...args: unknown[]): void {
    this.infos.push({ template, args });
  }

  error(err: unknown, template: string, ...args: unknown[]): void {
    this.errors.push({ err, template, args });
  }

  templates(): string[] {
    return this.infos.map((e) => e.template);
  }
}
