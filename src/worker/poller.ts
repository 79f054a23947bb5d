/**
 * Queue Poller
 *
 * Long-polls the ingestion queue, hands each message to the job processor and
 * deletes the ones whose disposition is `delete`. Retained messages become
 * visible again once their visibility timeout lapses.
 *
 * - Receives only as many messages as there is free capacity
 * - Exponential backoff after consecutive poll errors
 * - `stop()` waits for in-flight jobs up to the shutdown grace period
 */

import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import type { WorkerConfig } from './config';
import type { HealthCheckResult, HealthMonitor, HealthStatus } from './health';
import { calculateRetryDelay, type JobProcessor, type ProcessingResult } from './processor';
import type { QueueAdapter, QueueMessage } from './queue';

// =============================================================================
// TYPES
// =============================================================================

export type PollerState = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

export interface PollerStatus {
  state: PollerState;
  workerId: string;
  startedAt: number | null;
  lastPollAt: number | null;
  pollCount: number;
  consecutiveErrors: number;
  inFlight: number;
  health: HealthStatus;
}

// =============================================================================
// QUEUE POLLER CLASS
// =============================================================================

export class QueuePoller {
  private state: PollerState = 'stopped';
  private startedAt: number | null = null;
  private lastPollAt: number | null = null;
  private pollCount = 0;
  private consecutiveErrors = 0;

  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private loopPromise: Promise<void> | null = null;
  private readonly inFlight: Set<Promise<void>> = new Set();

  private readonly log: Log;

  constructor(
    private readonly config: WorkerConfig,
    private readonly queue: QueueAdapter,
    private readonly processor: JobProcessor,
    private readonly health: HealthMonitor,
    log: Log = rootLogger
  ) {
    this.log = log.child({ component: 'poller', workerId: config.workerId });
  }

  // ===========================================================================
  // LIFECYCLE METHODS
  // ===========================================================================

  /**
   * Starts the receive loop in the background.
   */
  start(): void {
    if (this.state !== 'stopped') {
      this.log.warn('Poller already running or starting');
      return;
    }

    this.state = 'starting';
    this.startedAt = Date.now();
    this.log.info('Starting queue poller', { queueUrl: this.config.queueUrl });

    this.startHealthCheckTimer();
    this.state = 'running';
    this.health.updateComponentHealth('poller', 'healthy');
    this.loopPromise = this.pollLoop().catch((error: unknown) => {
      this.state = 'error';
      this.health.updateComponentHealth('poller', 'unhealthy', errorMessage(error));
      this.log.error('Poll loop crashed', { error: errorMessage(error) });
    });
  }

  /**
   * Stops receiving and waits for in-flight jobs, up to the shutdown grace.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped' || this.state === 'stopping') {
      return;
    }

    this.log.info('Stopping queue poller', { inFlight: this.inFlight.size });
    this.state = 'stopping';
    this.interruptSleep();

    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }

    const drained = await this.waitForInFlight(this.config.shutdownTimeoutMs);
    if (drained) {
      await this.loopPromise;
    } else {
      this.log.warn('Shutdown timeout exceeded, abandoning in-flight jobs', {
        inFlight: this.inFlight.size,
      });
    }

    this.state = 'stopped';
    this.health.updateComponentHealth('poller', 'degraded', 'stopped');
    this.log.info('Queue poller stopped');
  }

  // ===========================================================================
  // POLLING LOOP
  // ===========================================================================

  private async pollLoop(): Promise<void> {
    while (this.state === 'running') {
      const pollStartTime = Date.now();
      let received = 0;

      try {
        received = await this.executePollCycle();
        this.consecutiveErrors = 0;
      } catch (error) {
        this.consecutiveErrors++;
        this.log.error('Poll cycle error', {
          error: errorMessage(error),
          consecutiveErrors: this.consecutiveErrors,
        });

        if (this.consecutiveErrors > 1) {
          const backoffDelay = calculateRetryDelay(this.consecutiveErrors - 1, this.config);
          this.log.info('Backing off after errors', { delayMs: backoffDelay });
          await this.sleep(backoffDelay);
        }
      }

      this.lastPollAt = Date.now();
      this.pollCount++;
      this.health.recordPollCycle(this.lastPollAt - pollStartTime, received);

      // At capacity: wait for a slot rather than spin on receive.
      if (this.state === 'running' && this.inFlight.size >= this.config.maxConcurrent) {
        await Promise.race(this.inFlight);
      }
    }
  }

  /**
   * Receives up to the free capacity and dispatches each message. Returns the
   * number of messages received.
   */
  private async executePollCycle(): Promise<number> {
    const capacity = this.config.maxConcurrent - this.inFlight.size;
    if (capacity <= 0) {
      return 0;
    }

    const messages = await this.queue.receive(Math.min(capacity, this.config.batchSize));
    if (messages.length === 0) {
      if (this.config.debug) {
        this.log.debug('No messages received');
      }
      return 0;
    }

    this.log.info('Received messages', {
      count: messages.length,
      messageIds: messages.map((message) => message.messageId),
    });

    for (const message of messages) {
      this.dispatch(message);
    }
    return messages.length;
  }

  private dispatch(message: QueueMessage): void {
    const task = this.handleMessage(message).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  /**
   * Never rejects; every failure is logged here.
   */
  private async handleMessage(message: QueueMessage): Promise<void> {
    let result: ProcessingResult;
    try {
      result = await this.processor.process(message);
    } catch (error) {
      this.log.error('Processor threw; message left for redelivery', {
        messageId: message.messageId,
        error: errorMessage(error),
      });
      return;
    }

    if (result.disposition !== 'delete') {
      this.log.warn('Message retained for redelivery', {
        messageId: message.messageId,
        packageID: result.packageID,
        statusCode: result.statusCode,
        receiveCount: message.receiveCount,
      });
      return;
    }

    try {
      await this.queue.delete(message);
    } catch (error) {
      this.log.error('Failed to delete processed message', {
        messageId: message.messageId,
        statusCode: result.statusCode,
        error: errorMessage(error),
      });
    }
  }

  // ===========================================================================
  // SHUTDOWN
  // ===========================================================================

  private async waitForInFlight(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const drained = Promise.allSettled([...this.inFlight]).then(() => true as const);

    try {
      return await Promise.race([drained, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ===========================================================================
  // HEALTH MONITORING
  // ===========================================================================

  private startHealthCheckTimer(): void {
    this.healthCheckTimer = setInterval(() => {
      const healthCheck = this.health.getHealthCheck();
      if (this.config.debug || healthCheck.status !== 'healthy') {
        this.log.info('Health check', {
          status: healthCheck.status,
          jobsSucceeded: healthCheck.counters.jobsSucceeded,
          jobsFailed: healthCheck.counters.jobsFailed,
          activeJobs: healthCheck.gauges.activeJobs,
        });
      }
    }, this.config.healthCheckIntervalMs);
  }

  getStatus(): PollerStatus {
    return {
      state: this.state,
      workerId: this.config.workerId,
      startedAt: this.startedAt,
      lastPollAt: this.lastPollAt,
      pollCount: this.pollCount,
      consecutiveErrors: this.consecutiveErrors,
      inFlight: this.inFlight.size,
      health: this.health.getHealthCheck().status,
    };
  }

  getHealthCheck(): HealthCheckResult {
    return this.health.getHealthCheck();
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.wake = null;
        this.sleepTimer = null;
        resolve();
      }, ms);
    });
  }

  private interruptSleep(): void {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
  }
}
