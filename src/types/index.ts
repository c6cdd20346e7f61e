import { z } from 'zod';

// ============================================================
// Configuration Types
// ============================================================

export const ConfigSchema = z.object({
  postgres: z.object({
    host: z.string(),
    port: z.number(),
    database: z.string(),
    user: z.string(),
    password: z.string(),
  }),
  templates: z.object({
    dir: z.string().min(1),
  }),
  monitoring: z.object({
    definitionsFile: z.string().min(1),
    tickSeconds: z.number().int().min(1),
    staleClaimMinutes: z.number().int().min(1),
    recencyDays: z.number().int().min(1),
    abnormalDecreasePercent: z.number().min(0).max(100),
    scoringPolicy: z.enum(['similarity', 'field-ratio']),
    createdBy: z.string().min(1),
  }),
  fetcher: z.object({
    timeoutMs: z.number().int().min(100),
    retries: z.number().int().min(1).max(10),
    retryDelayMs: z.number().int().min(0),
    userAgent: z.string(),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  logPretty: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================
// Error Types
// ============================================================

export class MonitoringError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'MonitoringError';
  }
}

/**
 * Raised while loading templates or monitor definitions. Aborts the
 * offending template only.
 */
export class ConfigurationError extends MonitoringError {
  constructor(
    message: string,
    public template?: string,
    details?: unknown
  ) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a scheduled check cannot fetch or extract its content.
 * The monitor keeps its schedule and is retried on the next cycle.
 */
export class ExtractionFailure extends MonitoringError {
  constructor(
    message: string,
    public monitorId?: string,
    details?: unknown
  ) {
    super(message, 'EXTRACTION_FAILURE', details);
    this.name = 'ExtractionFailure';
  }
}

export class ConflictOnWriteError extends MonitoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT_ON_WRITE', details);
    this.name = 'ConflictOnWriteError';
  }
}

export class PostgresError extends MonitoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'POSTGRES_ERROR', details);
    this.name = 'PostgresError';
  }
}

export class NotFoundError extends MonitoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends MonitoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_TRANSITION', details);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
