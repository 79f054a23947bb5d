/**
 * Worker Configuration
 *
 * Settings for the queue consumer. Every value can be overridden through the
 * environment.
 */

import { logger } from '../utils/logger';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

/**
 * Timing values are in milliseconds unless the name says otherwise.
 */
export interface WorkerConfig {
  /** Queue to consume (WORKER_QUEUE_URL, falling back to SQS_QUEUE_URL) */
  queueUrl: string;

  /** Long-poll wait per receive call (SQS_POLL_WAIT_TIME_SECONDS) */
  waitTimeSeconds: number;

  /** Visibility timeout requested on receive and on extension (SQS_VISIBILITY_TIMEOUT) */
  visibilityTimeoutSeconds: number;

  /** How often an in-flight message's visibility is extended (WORKER_VISIBILITY_EXTENSION_INTERVAL) */
  visibilityExtensionIntervalMs: number;

  /** Messages requested per receive, at most 10 (WORKER_BATCH_SIZE) */
  batchSize: number;

  /** Jobs processed at once (WORKER_MAX_CONCURRENT) */
  maxConcurrent: number;

  /** Run time after which a still-running job is logged as overrunning (WORKER_JOB_TIMEOUT) */
  jobTimeoutMs: number;

  /** Grace period for in-flight jobs on shutdown (WORKER_SHUTDOWN_TIMEOUT) */
  shutdownTimeoutMs: number;

  /** Base delay of the poll-error backoff (WORKER_RETRY_BASE_DELAY) */
  retryBaseDelayMs: number;

  /** Cap of the poll-error backoff (WORKER_RETRY_MAX_DELAY) */
  retryMaxDelayMs: number;

  /** Backoff multiplier (WORKER_RETRY_MULTIPLIER) */
  retryMultiplier: number;

  /** Health log interval (WORKER_HEALTH_CHECK_INTERVAL) */
  healthCheckIntervalMs: number;

  /** Worker instance identifier (WORKER_ID) */
  workerId: string;

  /** Verbose poller logging (WORKER_DEBUG) */
  debug: boolean;
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  queueUrl: '',
  waitTimeSeconds: 20,
  visibilityTimeoutSeconds: 180,
  visibilityExtensionIntervalMs: 60000,   // a third of the visibility timeout
  batchSize: 5,
  maxConcurrent: 5,
  jobTimeoutMs: 600000,                   // 10 minutes
  shutdownTimeoutMs: 30000,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 30000,
  retryMultiplier: 2,
  healthCheckIntervalMs: 30000,
  workerId: '',                           // generated at runtime
  debug: false,
};

/** SQS limits */
const MAX_RECEIVE_BATCH = 10;
const MAX_WAIT_TIME_SECONDS = 20;
const MAX_VISIBILITY_TIMEOUT_SECONDS = 43200;

// =============================================================================
// ENVIRONMENT VARIABLE PARSING
// =============================================================================

export function parseIntEnv(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn('Invalid integer environment value, using default', { key, value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

export function parseFloatEnv(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    logger.warn('Invalid float environment value, using default', { key, value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

export function parseBoolEnv(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

export function generateWorkerId(hostname: string = process.env.HOSTNAME || 'local'): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `worker-${hostname}-${timestamp}-${random}`;
}

// =============================================================================
// CONFIGURATION LOADER
// =============================================================================

/**
 * Reads the worker settings, falling back to defaults for anything unset.
 */
export function loadWorkerConfig(
  overrides?: Partial<WorkerConfig>,
  env: NodeJS.ProcessEnv = process.env
): WorkerConfig {
  const d = DEFAULT_WORKER_CONFIG;
  const config: WorkerConfig = {
    queueUrl: env.WORKER_QUEUE_URL || env.SQS_QUEUE_URL || d.queueUrl,
    waitTimeSeconds: parseIntEnv(env, 'SQS_POLL_WAIT_TIME_SECONDS', d.waitTimeSeconds),
    visibilityTimeoutSeconds: parseIntEnv(env, 'SQS_VISIBILITY_TIMEOUT', d.visibilityTimeoutSeconds),
    visibilityExtensionIntervalMs: parseIntEnv(
      env,
      'WORKER_VISIBILITY_EXTENSION_INTERVAL',
      d.visibilityExtensionIntervalMs
    ),
    batchSize: parseIntEnv(env, 'WORKER_BATCH_SIZE', d.batchSize),
    maxConcurrent: parseIntEnv(env, 'WORKER_MAX_CONCURRENT', d.maxConcurrent),
    jobTimeoutMs: parseIntEnv(env, 'WORKER_JOB_TIMEOUT', d.jobTimeoutMs),
    shutdownTimeoutMs: parseIntEnv(env, 'WORKER_SHUTDOWN_TIMEOUT', d.shutdownTimeoutMs),
    retryBaseDelayMs: parseIntEnv(env, 'WORKER_RETRY_BASE_DELAY', d.retryBaseDelayMs),
    retryMaxDelayMs: parseIntEnv(env, 'WORKER_RETRY_MAX_DELAY', d.retryMaxDelayMs),
    retryMultiplier: parseFloatEnv(env, 'WORKER_RETRY_MULTIPLIER', d.retryMultiplier),
    healthCheckIntervalMs: parseIntEnv(env, 'WORKER_HEALTH_CHECK_INTERVAL', d.healthCheckIntervalMs),
    workerId: env.WORKER_ID || generateWorkerId(env.HOSTNAME || 'local'),
    debug: parseBoolEnv(env, 'WORKER_DEBUG', d.debug),
  };

  if (overrides) {
    Object.assign(config, overrides);
  }

  return config;
}

// =============================================================================
// CONFIGURATION VALIDATION
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateWorkerConfig(config: WorkerConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.queueUrl) {
    errors.push('Queue URL is required (WORKER_QUEUE_URL or SQS_QUEUE_URL)');
  }

  if (config.waitTimeSeconds < 0 || config.waitTimeSeconds > MAX_WAIT_TIME_SECONDS) {
    errors.push(`Poll wait time must be between 0 and ${MAX_WAIT_TIME_SECONDS} seconds`);
  }
  if (config.waitTimeSeconds === 0) {
    warnings.push('Short polling (wait time 0) increases empty receives');
  }

  if (config.visibilityTimeoutSeconds < 1 || config.visibilityTimeoutSeconds > MAX_VISIBILITY_TIMEOUT_SECONDS) {
    errors.push(`Visibility timeout must be between 1 and ${MAX_VISIBILITY_TIMEOUT_SECONDS} seconds`);
  }
  if (config.visibilityExtensionIntervalMs >= config.visibilityTimeoutSeconds * 1000) {
    errors.push('Visibility extension interval must be shorter than the visibility timeout');
  }

  if (config.batchSize < 1 || config.batchSize > MAX_RECEIVE_BATCH) {
    errors.push(`Batch size must be between 1 and ${MAX_RECEIVE_BATCH}`);
  }

  if (config.maxConcurrent < 1) {
    errors.push('Max concurrent must be at least 1');
  }
  if (config.batchSize > config.maxConcurrent) {
    warnings.push('Batch size greater than max concurrent leaves received messages waiting');
  }

  if (config.jobTimeoutMs < 10000) {
    warnings.push('Job timeout less than 10 seconds will log most jobs as overrunning');
  }

  if (config.retryBaseDelayMs < 100) {
    warnings.push('Retry base delay less than 100ms may cause rapid retries');
  }
  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    errors.push('Retry max delay must not be less than the base delay');
  }

  if (config.shutdownTimeoutMs < 5000) {
    warnings.push('Shutdown timeout less than 5 seconds may cut off in-flight jobs');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =============================================================================
// CONFIGURATION LOGGING
// =============================================================================

export function getLoggableConfig(config: WorkerConfig): Record<string, unknown> {
  return {
    queueUrl: config.queueUrl,
    waitTimeSeconds: config.waitTimeSeconds,
    visibilityTimeoutSeconds: config.visibilityTimeoutSeconds,
    visibilityExtensionIntervalMs: config.visibilityExtensionIntervalMs,
    batchSize: config.batchSize,
    maxConcurrent: config.maxConcurrent,
    jobTimeoutMs: config.jobTimeoutMs,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
    retryMultiplier: config.retryMultiplier,
    healthCheckIntervalMs: config.healthCheckIntervalMs,
    workerId: config.workerId,
    debug: config.debug,
  };
}
