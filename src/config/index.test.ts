import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, getConfig, resetConfig } from './index.js';

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_PRETTY;
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
  });

  it('should load config with default values', () => {
    const config = loadConfig();

    expect(config.postgres.host).toBe('localhost');
    expect(config.postgres.port).toBe(5432);
    expect(config.postgres.database).toBe('content_monitor');
    expect(config.templates.dir).toBe('config/templates');
    expect(config.monitoring.definitionsFile).toBe('config/monitors.yaml');
    expect(config.monitoring.tickSeconds).toBe(60);
    expect(config.monitoring.staleClaimMinutes).toBe(30);
    expect(config.monitoring.recencyDays).toBe(7);
    expect(config.monitoring.abnormalDecreasePercent).toBe(50);
    expect(config.monitoring.scoringPolicy).toBe('similarity');
    expect(config.monitoring.createdBy).toBe('monitor');
    expect(config.fetcher.retries).toBe(3);
    expect(config.logLevel).toBe('info');
    expect(config.logPretty).toBe(true);
  });

  it('should override defaults with environment variables', () => {
    process.env.TEMPLATES_DIR = '/etc/monitor/templates';
    process.env.CHANGE_RECENCY_DAYS = '14';
    process.env.SCORING_POLICY = 'field-ratio';
    process.env.FETCH_TIMEOUT_MS = '5000';

    const config = loadConfig();

    expect(config.templates.dir).toBe('/etc/monitor/templates');
    expect(config.monitoring.recencyDays).toBe(14);
    expect(config.monitoring.scoringPolicy).toBe('field-ratio');
    expect(config.fetcher.timeoutMs).toBe(5000);
  });

  it('should parse boolean environment variables', () => {
    process.env.LOG_PRETTY = 'false';

    const config = loadConfig();

    expect(config.logPretty).toBe(false);
  });

  it('should reject non-numeric values for numeric variables', () => {
    process.env.POSTGRES_PORT = 'not-a-port';

    expect(() => loadConfig()).toThrow('Environment variable POSTGRES_PORT must be a number');
  });

  it('should validate the scoring policy', () => {
    process.env.SCORING_POLICY = 'random';

    expect(() => loadConfig()).toThrow();
  });

  it('should validate log level', () => {
    process.env.LOG_LEVEL = 'invalid';

    expect(() => loadConfig()).toThrow();
  });

  it('should cache the config until reset', () => {
    const first = getConfig();
    process.env.MONITOR_TICK_SECONDS = '5';

    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().monitoring.tickSeconds).toBe(5);
  });
});
