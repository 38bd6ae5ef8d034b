import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 4500, host: '0.0.0.0', logLevel: 'info', corsDev: false });
    expect(config.repo).toEqual({ kind: 'memory', databaseUrl: undefined, migrate: true });
    expect(config.worker).toEqual({ embedded: true, pollIntervalMs: 1500, executorTimeoutMs: 0, stopGraceMs: 5000 });
    expect(config.executor).toEqual({ kind: 'preview', previewDelayMs: 1000, previewMaxChars: 400 });
    expect(config.rateLimit).toEqual({ enabled: false, burst: 60, sustainedPerMin: 600 });
    expect(config.auth.apiKey).toBeUndefined();
  });

  it('should parse numbers and flags', () => {
    const config = loadConfig({
      PORT: '8080',
      WORKER_EMBEDDED: '0',
      WORKER_POLL_INTERVAL_MS: '250',
      EXECUTOR_KIND: 'echo',
      RATE_LIMIT_ENABLED: '1',
      JOBS_API_KEY: 'test-secret',
    });

    expect(config.server.port).toBe(8080);
    expect(config.worker.embedded).toBe(false);
    expect(config.worker.pollIntervalMs).toBe(250);
    expect(config.executor.kind).toBe('echo');
    expect(config.rateLimit.enabled).toBe(true);
    expect(config.auth.apiKey).toBe('test-secret');
  });

  it('should treat empty values as unset', () => {
    expect(loadConfig({ PORT: '', JOBS_API_KEY: '' }).server.port).toBe(4500);
  });

  it('should require a database url for postgres', () => {
    expect(() => loadConfig({ REPO_KIND: 'postgres' })).toThrow(ConfigError);
    expect(() => loadConfig({ REPO_KIND: 'postgres' })).toThrow('DATABASE_URL: required when REPO_KIND=postgres');
    expect(loadConfig({ REPO_KIND: 'postgres', DATABASE_URL: 'postgres://localhost/skills' }).repo.databaseUrl)
      .toBe('postgres://localhost/skills');
  });

  it('should list every invalid key', () => {
    try {
      loadConfig({ PORT: 'eighty', EXECUTOR_KIND: 'sandbox' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map(issue => issue.split(':')[0])).toEqual(['PORT', 'EXECUTOR_KIND']);
    }
  });
});
