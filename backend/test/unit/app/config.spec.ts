import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults when only DATABASE_URL is set', () => {
    const config = buildConfig({ DATABASE_URL: 'postgres://localhost/users' });

    expect(config).toEqual({
      nodeEnv: 'development',
      port: 3000,
      databaseUrl: 'postgres://localhost/users',
      logLevel: 'info',
      serviceName: 'users-api',
    });
  });

  it('coerces PORT and reads explicit values', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_URL: 'postgres://db/users',
      LOG_LEVEL: 'warn',
      SERVICE_NAME: 'users-api-prod',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('warn');
    expect(config.serviceName).toBe('users-api-prod');
  });

  it('rejects a missing DATABASE_URL', () => {
    expect(() => buildConfig({})).toThrow(ZodError);
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => buildConfig({ NODE_ENV: 'staging', DATABASE_URL: 'postgres://db/users' })).toThrow(
      ZodError,
    );
  });
});
