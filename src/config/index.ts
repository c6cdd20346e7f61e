import { config as dotenvConfig } from 'dotenv';
import { Config, ConfigSchema } from '../types/index.js';

dotenvConfig();

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === 'true';
}

export function loadConfig(): Config {
  const rawConfig = {
    postgres: {
      host: getEnvString('POSTGRES_HOST', 'localhost'),
      port: getEnvNumber('POSTGRES_PORT', 5432),
      database: getEnvString('POSTGRES_DB', 'content_monitor'),
      user: getEnvString('POSTGRES_USER', 'postgres'),
      password: getEnvString('POSTGRES_PASSWORD', 'postgres'),
    },
    templates: {
      dir: getEnvString('TEMPLATES_DIR', 'config/templates'),
    },
    monitoring: {
      definitionsFile: getEnvString('MONITORS_FILE', 'config/monitors.yaml'),
      tickSeconds: getEnvNumber('MONITOR_TICK_SECONDS', 60),
      staleClaimMinutes: getEnvNumber('MONITOR_STALE_CLAIM_MINUTES', 30),
      recencyDays: getEnvNumber('CHANGE_RECENCY_DAYS', 7),
      abnormalDecreasePercent: getEnvNumber('ABNORMAL_DECREASE_PERCENT', 50),
      scoringPolicy: getEnvString('SCORING_POLICY', 'similarity'),
      createdBy: getEnvString('CHANGE_CREATED_BY', 'monitor'),
    },
    fetcher: {
      timeoutMs: getEnvNumber('FETCH_TIMEOUT_MS', 30000),
      retries: getEnvNumber('FETCH_RETRIES', 3),
      retryDelayMs: getEnvNumber('FETCH_RETRY_DELAY_MS', 1000),
      userAgent: getEnvString('FETCH_USER_AGENT', 'ContentChangeMonitor/1.0'),
    },
    logLevel: getEnvString('LOG_LEVEL', 'info'),
    logPretty: getEnvBoolean('LOG_PRETTY', true),
  };

  return ConfigSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
