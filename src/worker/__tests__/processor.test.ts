/**
 * Job Processor Tests
 *
 * Message parsing, queue dispositions, the job timeout and visibility
 * extension while a job runs.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

import {
  createMockMetadata,
  InMemoryCandidatePool,
  InMemoryFeatureStore,
  InMemoryGraph,
  silentLog,
  StubAIAdapter,
  StubDataAccess,
} from '../../__tests__/fakes';
import { createConsentGate } from '../../consent/consentGate';
import { createPkgWriter } from '../../graph/pkgWriter';
import { createJobOrchestrator } from '../../pipeline/orchestrator';
import type { JobOutcome } from '../../pipeline/stages';
import { TimeoutError, ValidationError } from '../../utils/errors';
import { loadWorkerConfig } from '../config';
import { HealthMonitor } from '../health';
import { classifyError, dispositionFor, JobProcessor, type JobRunner } from '../processor';
import type { QueueAdapter, QueueMessage } from '../queue';

// =============================================================================
// TEST FIXTURES
// =============================================================================

class RecordingQueue implements QueueAdapter {
  deleted: string[] = [];
  extended: Array<{ messageId: string; seconds: number }> = [];

  async receive(): Promise<QueueMessage[]> {
    return [];
  }

  async delete(message: QueueMessage): Promise<void> {
    this.deleted.push(message.messageId);
  }

  async extendVisibility(message: QueueMessage, visibilityTimeoutSeconds: number): Promise<void> {
    this.extended.push({ messageId: message.messageId, seconds: visibilityTimeoutSeconds });
  }
}

const createBody = (overrides: Record<string, unknown> = {}) =>
  JSON.stringify({
    packageID: 'pkg-1',
    userID: 'user-1',
    consentTokenID: 'consent-token-1',
    rawDataReference: 's3://packages/user-1/pkg-1.txt',
    dataType: 'text/plain',
    ...overrides,
  });

const createMessage = (body: string = createBody()): QueueMessage => ({
  messageId: 'msg-1',
  receiptHandle: 'receipt-1',
  body,
  receiveCount: 1,
});

const createOutcome = (overrides: Partial<JobOutcome> = {}): JobOutcome => ({
  status: 'SUCCESS',
  packageID: 'pkg-1',
  userID: 'user-1',
  completedStages: [],
  retryable: false,
  featureSetIDs: [],
  candidateIDs: [],
  conceptCount: 0,
  skipped: [],
  persistence: { features: 'written', candidates: 'written', graph: 'written' },
  durationMs: 5,
  ...overrides,
});

const createConfig = (jobTimeoutMs = 1000) =>
  loadWorkerConfig(
    {
      queueUrl: 'q',
      workerId: 'worker-test',
      jobTimeoutMs,
      visibilityExtensionIntervalMs: 20,
      visibilityTimeoutSeconds: 30,
    },
    {}
  );

// =============================================================================
// CLASSIFICATION
// =============================================================================

describe('classifyError', () => {
  it.each([
    [new TimeoutError('job pkg-1', 10), 'TIMEOUT', true],
    [new ValidationError('userID is required', 'userID'), 'INVALID_MESSAGE', false],
    [new Error('Request timed out'), 'TIMEOUT', true],
    [new Error('rate limit exceeded'), 'RATE_LIMITED', true],
    [new Error('connect ECONNREFUSED 127.0.0.1:5432'), 'NETWORK_ERROR', true],
    [new Error('Invalid JSON in message'), 'INVALID_MESSAGE', false],
    [new Error('mongo write concern failed'), 'STORAGE_ERROR', true],
    [new Error('Cypher syntax error'), 'GRAPH_ERROR', true],
    [new Error('boom'), 'UNKNOWN_ERROR', true],
  ])('should classify %s', (error, code, retryable) => {
    const result = classifyError(error);
    expect(result.code).toBe(code);
    expect(result.retryable).toBe(retryable);
  });
});

describe('dispositionFor', () => {
  it('should delete successful and partial runs', () => {
    expect(dispositionFor(createOutcome())).toEqual({ disposition: 'delete', statusCode: 'SUCCESS' });
    expect(dispositionFor(createOutcome({ status: 'PARTIAL_SUCCESS' }))).toEqual({
      disposition: 'delete',
      statusCode: 'PARTIAL_SUCCESS',
    });
  });

  it('should retain retryable failures', () => {
    expect(dispositionFor(createOutcome({ status: 'FAILED', retryable: true }))).toEqual({
      disposition: 'retain',
      statusCode: 'RETRY_LATER',
    });
  });

  it('should delete terminal failures, naming a missing package', () => {
    expect(
      dispositionFor(createOutcome({ status: 'FAILED', failedStage: 'FETCH_METADATA' }))
    ).toEqual({ disposition: 'delete', statusCode: 'DELETE_NO_METADATA' });
    expect(
      dispositionFor(createOutcome({ status: 'FAILED', failedStage: 'VERIFY_CONSENT' }))
    ).toEqual({ disposition: 'delete', statusCode: 'DELETE_FAILED' });
  });
});

// =============================================================================
// PROCESSING
// =============================================================================

describe('JobProcessor', () => {
  let queue: RecordingQueue;
  let monitor: HealthMonitor;
  let run: Mock<JobRunner['run']>;

  const createProcessor = (jobTimeoutMs?: number) =>
    new JobProcessor(createConfig(jobTimeoutMs), queue, { run }, monitor, silentLog);

  beforeEach(() => {
    queue = new RecordingQueue();
    monitor = new HealthMonitor('worker-test');
    run = vi.fn<JobRunner['run']>().mockResolvedValue(createOutcome());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run a parsed job and mark it for deletion', async () => {
    const result = await createProcessor().process(createMessage(createBody({ sourceDescription: 'Notes' })));

    expect(result.disposition).toBe('delete');
    expect(result.statusCode).toBe('SUCCESS');
    expect(result.packageID).toBe('pkg-1');
    expect(run).toHaveBeenCalledWith({
      packageID: 'pkg-1',
      userID: 'user-1',
      consentTokenID: 'consent-token-1',
      rawDataReference: 's3://packages/user-1/pkg-1.txt',
      dataType: 'text/plain',
      sourceDescription: 'Notes',
      metadata: {},
      sqsMessageId: 'msg-1',
    });
    expect(monitor.getHealthCheck().counters.jobsSucceeded).toBe(1);
    expect(monitor.getActiveJobs()).toBe(0);
  });

  it('should delete a body that is not JSON without running it', async () => {
    const result = await createProcessor().process(createMessage('not json'));

    expect(result).toMatchObject({
      packageID: null,
      disposition: 'delete',
      statusCode: 'DELETE_MALFORMED',
      error: 'Message body is not valid JSON',
      errorCode: 'INVALID_MESSAGE',
    });
    expect(run).not.toHaveBeenCalled();
    expect(monitor.getHealthCheck().counters.messagesMalformed).toBe(1);
  });

  it('should delete a message missing a required field', async () => {
    const result = await createProcessor().process(createMessage(createBody({ userID: undefined })));

    expect(result.statusCode).toBe('DELETE_MALFORMED');
    expect(result.error).toBe('userID is required');
  });

  it('should count partial successes', async () => {
    run.mockResolvedValue(createOutcome({ status: 'PARTIAL_SUCCESS' }));

    const result = await createProcessor().process(createMessage());

    expect(result.statusCode).toBe('PARTIAL_SUCCESS');
    expect(monitor.getHealthCheck().counters.jobsPartial).toBe(1);
  });

  it('should retain a retryable failure and carry its reason', async () => {
    run.mockResolvedValue(
      createOutcome({ status: 'FAILED', retryable: true, failedStage: 'FETCH_METADATA', reason: 'lookup failed' })
    );

    const result = await createProcessor().process(createMessage());

    expect(result.disposition).toBe('retain');
    expect(result.statusCode).toBe('RETRY_LATER');
    expect(result.error).toBe('lookup failed');
    const { counters } = monitor.getHealthCheck();
    expect(counters.jobsFailed).toBe(1);
    expect(counters.jobsRetained).toBe(1);
  });

  it('should keep a job that overruns the job timeout until it finishes', async () => {
    vi.useFakeTimers();
    let finished = false;
    run.mockImplementation(
      () =>
        new Promise<JobOutcome>((resolve) =>
          setTimeout(() => {
            finished = true;
            resolve(createOutcome());
          }, 100)
        )
    );

    const pending = createProcessor(30).process(createMessage());
    await vi.advanceTimersByTimeAsync(50);
    expect(finished).toBe(false);
    expect(monitor.getActiveJobs()).toBe(1);

    await vi.advanceTimersByTimeAsync(50);
    const result = await pending;

    expect(finished).toBe(true);
    expect(result.disposition).toBe('delete');
    expect(result.statusCode).toBe('SUCCESS');
    expect(queue.extended.length).toBeGreaterThanOrEqual(3);
  });

  it('should retain a job whose runner throws an unknown error', async () => {
    run.mockRejectedValue(new Error('boom'));

    const result = await createProcessor().process(createMessage());

    expect(result.disposition).toBe('retain');
    expect(result.errorCode).toBe('UNKNOWN_ERROR');
    expect(monitor.getActiveJobs()).toBe(0);
  });

  it('should delete a job whose runner throws a non-retryable error', async () => {
    run.mockRejectedValue(new ValidationError('dataType must not be empty', 'dataType'));

    const result = await createProcessor().process(createMessage());

    expect(result.disposition).toBe('delete');
    expect(result.statusCode).toBe('DELETE_FAILED');
  });

  it('should extend visibility while the job runs and stop afterwards', async () => {
    vi.useFakeTimers();
    run.mockImplementation(
      () => new Promise<JobOutcome>((resolve) => setTimeout(() => resolve(createOutcome()), 70))
    );

    const pending = createProcessor().process(createMessage());
    await vi.advanceTimersByTimeAsync(70);
    const result = await pending;

    expect(result.statusCode).toBe('SUCCESS');
    const extensions = queue.extended.length;
    expect(extensions).toBeGreaterThanOrEqual(2);
    expect(queue.extended[0]).toEqual({ messageId: 'msg-1', seconds: 30 });
    expect(monitor.getHealthCheck().counters.visibilityExtensions).toBe(extensions);

    await vi.advanceTimersByTimeAsync(100);
    expect(queue.extended).toHaveLength(extensions);
  });

  it('should run a message without a consent token to a consent-denied success', async () => {
    const dataAccess = new StubDataAccess();
    dataAccess.metadata = createMockMetadata({ consentTokenID: null });
    const fetchImpl = vi.fn<typeof fetch>();
    const orchestrator = createJobOrchestrator(
      {
        dataAccess,
        consent: createConsentGate({ baseUrl: 'http://consent.test' }, silentLog, fetchImpl),
        aiAdapter: new StubAIAdapter(),
        featureStore: new InMemoryFeatureStore(),
        candidatePool: new InMemoryCandidatePool(),
        pkgWriter: createPkgWriter(new InMemoryGraph(), { log: silentLog }),
      },
      { log: silentLog }
    );
    const processor = new JobProcessor(createConfig(), queue, orchestrator, monitor, silentLog);

    const result = await processor.process(createMessage(createBody({ consentTokenID: undefined })));

    expect(result.disposition).toBe('delete');
    expect(result.statusCode).toBe('SUCCESS');
    expect(result.outcome?.skipped).toEqual([
      { modality: 'text', task: null, kind: 'consent_denied', reason: 'Missing consentTokenID for verification' },
    ]);
    expect(result.outcome?.featureSetIDs).toEqual([]);
    expect(dataAccess.lastBytes).toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
