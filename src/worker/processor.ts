/**
 * Job Processor
 *
 * Turns one queue message into one orchestrator run. Keeps the message
 * invisible until the run reaches an outcome, then decides whether the
 * message is deleted or left for redelivery.
 */

import type { IngestionJob } from '../types/models';
import type { JobOutcome } from '../pipeline/stages';
import { TimeoutError, ValidationError, errorMessage, isPipelineError } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import { parseJobMessage } from '../utils/validation';
import type { WorkerConfig } from './config';
import type { HealthMonitor } from './health';
import type { QueueAdapter, QueueMessage } from './queue';

// =============================================================================
// TYPES
// =============================================================================

export type Disposition = 'delete' | 'retain';

export type ProcessingStatusCode =
  | 'SUCCESS'
  | 'PARTIAL_SUCCESS'
  | 'DELETE_MALFORMED'
  | 'DELETE_NO_METADATA'
  | 'DELETE_FAILED'
  | 'RETRY_LATER';

export interface ProcessingResult {
  messageId: string;
  packageID: string | null;
  disposition: Disposition;
  statusCode: ProcessingStatusCode;
  processingTimeMs: number;
  error?: string;
  errorCode?: ErrorCode;
  outcome?: JobOutcome;
}

/**
 * Anything that can run a parsed job to an outcome.
 */
export interface JobRunner {
  run(job: IngestionJob): Promise<JobOutcome>;
}

export type ErrorCode =
  | 'TIMEOUT'
  | 'INVALID_MESSAGE'
  | 'NETWORK_ERROR'
  | 'RATE_LIMITED'
  | 'STORAGE_ERROR'
  | 'GRAPH_ERROR'
  | 'UNKNOWN_ERROR';

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

const ERROR_PATTERNS: Array<{ pattern: RegExp; code: ErrorCode; retryable: boolean }> = [
  { pattern: /timed? ?out/i, code: 'TIMEOUT', retryable: true },
  { pattern: /rate.*(limit|throttl)|quota/i, code: 'RATE_LIMITED', retryable: true },
  { pattern: /network|connect|ECONNREFUSED|ENOTFOUND|ECONNRESET/i, code: 'NETWORK_ERROR', retryable: true },
  { pattern: /invalid.*(message|json)|missing.*field/i, code: 'INVALID_MESSAGE', retryable: false },
  { pattern: /mongo|postgres|database|storage/i, code: 'STORAGE_ERROR', retryable: true },
  { pattern: /graph|neo4j|cypher/i, code: 'GRAPH_ERROR', retryable: true },
];

export function classifyError(error: unknown): { code: ErrorCode; retryable: boolean; message: string } {
  const message = errorMessage(error);

  if (error instanceof TimeoutError) {
    return { code: 'TIMEOUT', retryable: true, message };
  }
  if (error instanceof ValidationError) {
    return { code: 'INVALID_MESSAGE', retryable: false, message };
  }

  for (const { pattern, code, retryable } of ERROR_PATTERNS) {
    if (pattern.test(message)) {
      return { code, retryable, message };
    }
  }

  return { code: 'UNKNOWN_ERROR', retryable: true, message };
}

/**
 * Queue disposition for a finished run.
 */
export function dispositionFor(outcome: JobOutcome): { disposition: Disposition; statusCode: ProcessingStatusCode } {
  switch (outcome.status) {
    case 'SUCCESS':
      return { disposition: 'delete', statusCode: 'SUCCESS' };
    case 'PARTIAL_SUCCESS':
      return { disposition: 'delete', statusCode: 'PARTIAL_SUCCESS' };
    case 'FAILED':
      if (outcome.retryable) {
        return { disposition: 'retain', statusCode: 'RETRY_LATER' };
      }
      if (outcome.failedStage === 'FETCH_METADATA') {
        return { disposition: 'delete', statusCode: 'DELETE_NO_METADATA' };
      }
      return { disposition: 'delete', statusCode: 'DELETE_FAILED' };
  }
}

// =============================================================================
// VISIBILITY EXTENDER
// =============================================================================

/**
 * Periodically pushes back a message's visibility timeout while its job runs.
 */
export class VisibilityExtender {
  private timer: NodeJS.Timeout | null = null;
  private active = false;
  private extensionCount = 0;

  constructor(
    private readonly config: Pick<WorkerConfig, 'visibilityTimeoutSeconds' | 'visibilityExtensionIntervalMs'>,
    private readonly queue: QueueAdapter,
    private readonly health: HealthMonitor,
    private readonly log: Log
  ) {}

  start(message: QueueMessage): void {
    this.stop();
    this.active = true;
    this.extensionCount = 0;
    this.schedule(message);
  }

  stop(): void {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(message: QueueMessage): void {
    this.timer = setTimeout(() => {
      void this.extend(message).then(() => {
        if (this.active) {
          this.schedule(message);
        }
      });
    }, this.config.visibilityExtensionIntervalMs);
  }

  private async extend(message: QueueMessage): Promise<void> {
    if (!this.active) return;
    try {
      await this.queue.extendVisibility(message, this.config.visibilityTimeoutSeconds);
      this.extensionCount++;
      this.health.recordVisibilityExtension(true);
      this.log.debug('Extended message visibility', {
        messageId: message.messageId,
        count: this.extensionCount,
      });
    } catch (error) {
      this.health.recordVisibilityExtension(false);
      this.log.warn('Failed to extend message visibility', {
        messageId: message.messageId,
        error: errorMessage(error),
      });
    }
  }
}

// =============================================================================
// JOB PROCESSOR CLASS
// =============================================================================

export class JobProcessor {
  private readonly log: Log;

  constructor(
    private readonly config: WorkerConfig,
    private readonly queue: QueueAdapter,
    private readonly runner: JobRunner,
    private readonly health: HealthMonitor,
    log: Log = rootLogger
  ) {
    this.log = log.child({ component: 'processor', workerId: config.workerId });
  }

  async process(message: QueueMessage): Promise<ProcessingResult> {
    const startTime = Date.now();

    let job: IngestionJob;
    try {
      job = parseJobMessage(message.body, message.messageId);
    } catch (error) {
      const classification = classifyError(error);
      this.health.recordMalformedMessage();
      this.log.error('Malformed queue message', {
        messageId: message.messageId,
        error: classification.message,
        ...(isPipelineError(error) ? { details: error.details } : {}),
      });
      return {
        messageId: message.messageId,
        packageID: null,
        disposition: 'delete',
        statusCode: 'DELETE_MALFORMED',
        processingTimeMs: Date.now() - startTime,
        error: classification.message,
        errorCode: classification.code,
      };
    }

    const extender = new VisibilityExtender(this.config, this.queue, this.health, this.log);
    extender.start(message);
    this.health.incrementActiveJobs();

    // A run is never abandoned: the message stays invisible until it ends.
    const overrunTimer = setTimeout(() => {
      this.log.warn('Job is running past the job timeout', {
        messageId: message.messageId,
        packageID: job.packageID,
        jobTimeoutMs: this.config.jobTimeoutMs,
      });
    }, this.config.jobTimeoutMs);

    try {
      const outcome = await this.runner.run(job);
      return this.fromOutcome(message, job, outcome, Date.now() - startTime);
    } catch (error) {
      return this.fromError(message, job, error, Date.now() - startTime);
    } finally {
      clearTimeout(overrunTimer);
      extender.stop();
      this.health.decrementActiveJobs();
    }
  }

  private fromOutcome(
    message: QueueMessage,
    job: IngestionJob,
    outcome: JobOutcome,
    processingTimeMs: number
  ): ProcessingResult {
    const { disposition, statusCode } = dispositionFor(outcome);

    if (outcome.status === 'FAILED') {
      this.health.recordJobFailed(processingTimeMs);
    } else {
      this.health.recordJobSucceeded(processingTimeMs, outcome.status === 'PARTIAL_SUCCESS');
    }
    if (disposition === 'retain') {
      this.health.recordJobRetained();
    }

    this.log.info('Job processed', {
      messageId: message.messageId,
      packageID: job.packageID,
      statusCode,
      disposition,
      receiveCount: message.receiveCount,
      processingTimeMs,
    });

    return {
      messageId: message.messageId,
      packageID: job.packageID,
      disposition,
      statusCode,
      processingTimeMs,
      ...(outcome.reason !== undefined ? { error: outcome.reason } : {}),
      outcome,
    };
  }

  private fromError(
    message: QueueMessage,
    job: IngestionJob,
    error: unknown,
    processingTimeMs: number
  ): ProcessingResult {
    const classification = classifyError(error);
    const disposition: Disposition = classification.retryable ? 'retain' : 'delete';

    if (disposition === 'retain') {
      this.health.recordJobRetained();
    } else {
      this.health.recordJobFailed(processingTimeMs);
    }

    this.log.error('Job did not complete', {
      messageId: message.messageId,
      packageID: job.packageID,
      errorCode: classification.code,
      retryable: classification.retryable,
      error: classification.message,
    });

    return {
      messageId: message.messageId,
      packageID: job.packageID,
      disposition,
      statusCode: disposition === 'retain' ? 'RETRY_LATER' : 'DELETE_FAILED',
      processingTimeMs,
      error: classification.message,
      errorCode: classification.code,
    };
  }
}

// =============================================================================
// RETRY DELAY CALCULATOR
// =============================================================================

/**
 * Exponential backoff with +/-10% jitter.
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: Pick<WorkerConfig, 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'retryMultiplier'>,
  random: () => number = Math.random
): number {
  const delay = Math.min(
    config.retryBaseDelayMs * Math.pow(config.retryMultiplier, attemptNumber),
    config.retryMaxDelayMs
  );
  const jitter = delay * 0.1 * (random() * 2 - 1);
  return Math.round(delay + jitter);
}
