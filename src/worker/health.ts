/**
 * Worker Health Monitoring
 *
 * Counters, an active-job gauge, processing latency and per-component status
 * for the queue consumer. The health server reports `getHealthCheck()`.
 */

// =============================================================================
// METRICS TYPES
// =============================================================================

export interface CounterMetrics {
  /** Jobs that ended SUCCESS or PARTIAL_SUCCESS */
  jobsSucceeded: number;

  /** Subset of `jobsSucceeded` where a store was skipped or failed */
  jobsPartial: number;

  /** Jobs that ended FAILED and were deleted */
  jobsFailed: number;

  /** Jobs left on the queue for redelivery */
  jobsRetained: number;

  /** Messages deleted because they could not be parsed */
  messagesMalformed: number;

  pollCycles: number;
  emptyPollCycles: number;

  visibilityExtensions: number;
  visibilityExtensionFailures: number;
}

export interface GaugeMetrics {
  activeJobs: number;
  lastPollDurationMs: number;
  lastProcessingDurationMs: number;
  timeSinceLastSuccessMs: number;
  timeSinceLastPollMs: number;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unknown';

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  count: number;
}

export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  lastCheck: number;
  error?: string;
}

export interface HealthCheckResult {
  status: HealthStatus;
  workerId: string;
  timestamp: number;
  uptimeMs: number;
  counters: CounterMetrics;
  gauges: GaugeMetrics;
  latency: LatencyStats;
  components: ComponentHealth[];
  /** Human-readable summary */
  message: string;
}

export interface HealthThresholds {
  /** No success for this long, with activity, is degraded */
  maxTimeSinceSuccessMs: number;
  /** No success for this long, with only failures, is unhealthy */
  criticalTimeSinceSuccessMs: number;
  /** Failed share of finished jobs above which the worker is degraded */
  maxErrorRate: number;
}

const DEFAULT_THRESHOLDS: HealthThresholds = {
  maxTimeSinceSuccessMs: 300000,
  criticalTimeSinceSuccessMs: 600000,
  maxErrorRate: 0.1,
};

const MAX_LATENCY_SAMPLES = 1000;

function emptyCounters(): CounterMetrics {
  return {
    jobsSucceeded: 0,
    jobsPartial: 0,
    jobsFailed: 0,
    jobsRetained: 0,
    messagesMalformed: 0,
    pollCycles: 0,
    emptyPollCycles: 0,
    visibilityExtensions: 0,
    visibilityExtensionFailures: 0,
  };
}

// =============================================================================
// HEALTH MONITOR CLASS
// =============================================================================

export class HealthMonitor {
  private startTime: number;
  private counters: CounterMetrics = emptyCounters();
  private activeJobs = 0;
  private lastPollDurationMs = 0;
  private lastProcessingDurationMs = 0;

  private latencySamples: number[] = [];
  private latencySum = 0;
  private latencyCount = 0;

  private lastSuccessTime = 0;
  private lastPollTime = 0;

  private componentHealth: Map<string, ComponentHealth> = new Map();
  private readonly thresholds: HealthThresholds;

  constructor(
    private readonly workerId: string,
    thresholds: Partial<HealthThresholds> = {},
    private readonly clock: () => number = Date.now
  ) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    this.startTime = clock();
  }

  // ===========================================================================
  // COUNTERS
  // ===========================================================================

  recordJobSucceeded(latencyMs: number, partial: boolean): void {
    this.counters.jobsSucceeded++;
    if (partial) {
      this.counters.jobsPartial++;
    }
    this.lastSuccessTime = this.clock();
    this.recordLatency(latencyMs);
  }

  recordJobFailed(latencyMs: number): void {
    this.counters.jobsFailed++;
    this.recordLatency(latencyMs);
  }

  recordJobRetained(): void {
    this.counters.jobsRetained++;
  }

  recordMalformedMessage(): void {
    this.counters.messagesMalformed++;
  }

  recordPollCycle(durationMs: number, messageCount: number): void {
    this.counters.pollCycles++;
    this.lastPollTime = this.clock();
    this.lastPollDurationMs = durationMs;
    if (messageCount === 0) {
      this.counters.emptyPollCycles++;
    }
  }

  recordVisibilityExtension(success: boolean): void {
    if (success) {
      this.counters.visibilityExtensions++;
    } else {
      this.counters.visibilityExtensionFailures++;
    }
  }

  // ===========================================================================
  // GAUGES
  // ===========================================================================

  incrementActiveJobs(): void {
    this.activeJobs++;
  }

  decrementActiveJobs(): void {
    this.activeJobs = Math.max(0, this.activeJobs - 1);
  }

  getActiveJobs(): number {
    return this.activeJobs;
  }

  // ===========================================================================
  // LATENCY
  // ===========================================================================

  private recordLatency(latencyMs: number): void {
    this.lastProcessingDurationMs = latencyMs;
    this.latencySum += latencyMs;
    this.latencyCount++;
    this.latencySamples.push(latencyMs);
    if (this.latencySamples.length > MAX_LATENCY_SAMPLES) {
      this.latencySamples.shift();
    }
  }

  private calculateLatencyStats(): LatencyStats {
    const sorted = [...this.latencySamples].sort((a, b) => a - b);
    if (sorted.length === 0) {
      return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0, count: 0 };
    }

    return {
      min: sorted[0] ?? 0,
      max: sorted[sorted.length - 1] ?? 0,
      avg: this.latencySum / this.latencyCount,
      p50: percentile(sorted, 50),
      p95: percentile(sorted, 95),
      p99: percentile(sorted, 99),
      count: this.latencyCount,
    };
  }

  // ===========================================================================
  // COMPONENT HEALTH
  // ===========================================================================

  updateComponentHealth(name: string, status: HealthStatus, error?: string): void {
    this.componentHealth.set(name, {
      name,
      status,
      lastCheck: this.clock(),
      ...(error !== undefined ? { error } : {}),
    });
  }

  // ===========================================================================
  // HEALTH CHECK
  // ===========================================================================

  getHealthCheck(): HealthCheckResult {
    const now = this.clock();
    const gauges: GaugeMetrics = {
      activeJobs: this.activeJobs,
      lastPollDurationMs: this.lastPollDurationMs,
      lastProcessingDurationMs: this.lastProcessingDurationMs,
      timeSinceLastSuccessMs: now - (this.lastSuccessTime > 0 ? this.lastSuccessTime : this.startTime),
      timeSinceLastPollMs: now - (this.lastPollTime > 0 ? this.lastPollTime : this.startTime),
    };

    const status = this.determineHealthStatus(gauges);

    return {
      status,
      workerId: this.workerId,
      timestamp: now,
      uptimeMs: now - this.startTime,
      counters: { ...this.counters },
      gauges,
      latency: this.calculateLatencyStats(),
      components: Array.from(this.componentHealth.values()),
      message: this.generateHealthMessage(status, gauges, now),
    };
  }

  private determineHealthStatus(gauges: GaugeMetrics): HealthStatus {
    const { counters, thresholds } = this;
    const components = Array.from(this.componentHealth.values());

    if (
      gauges.timeSinceLastSuccessMs > thresholds.criticalTimeSinceSuccessMs &&
      counters.pollCycles > 0 &&
      counters.jobsSucceeded === 0 &&
      counters.jobsFailed > 0
    ) {
      return 'unhealthy';
    }

    if (components.some((component) => component.status === 'unhealthy')) {
      return 'unhealthy';
    }

    if (this.calculateErrorRate() > thresholds.maxErrorRate) {
      return 'degraded';
    }

    if (
      gauges.timeSinceLastSuccessMs > thresholds.maxTimeSinceSuccessMs &&
      counters.pollCycles > 0 &&
      counters.jobsSucceeded > 0
    ) {
      return 'degraded';
    }

    if (components.some((component) => component.status === 'degraded')) {
      return 'degraded';
    }

    if (counters.pollCycles === 0) {
      return 'unknown';
    }

    return 'healthy';
  }

  private calculateErrorRate(): number {
    const total = this.counters.jobsSucceeded + this.counters.jobsFailed;
    if (total === 0) return 0;
    return this.counters.jobsFailed / total;
  }

  private generateHealthMessage(status: HealthStatus, gauges: GaugeMetrics, now: number): string {
    const uptimeMinutes = Math.floor((now - this.startTime) / 60000);
    const errorRate = (this.calculateErrorRate() * 100).toFixed(1);

    switch (status) {
      case 'healthy':
        return `Worker healthy. Uptime: ${uptimeMinutes}m, Succeeded: ${this.counters.jobsSucceeded}, Error rate: ${errorRate}%`;
      case 'degraded':
        return `Worker degraded. Error rate: ${errorRate}%, Time since last success: ${gauges.timeSinceLastSuccessMs}ms`;
      case 'unhealthy':
        return `Worker unhealthy. Failed: ${this.counters.jobsFailed}, No successful job in ${gauges.timeSinceLastSuccessMs}ms`;
      case 'unknown':
        return 'Worker starting up. No polling activity yet.';
    }
  }

  reset(): void {
    this.counters = emptyCounters();
    this.activeJobs = 0;
    this.lastPollDurationMs = 0;
    this.lastProcessingDurationMs = 0;
    this.latencySamples = [];
    this.latencySum = 0;
    this.latencyCount = 0;
    this.lastSuccessTime = 0;
    this.lastPollTime = 0;
    this.componentHealth.clear();
    this.startTime = this.clock();
  }
}

function percentile(sorted: number[], p: number): number {
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)] ?? 0;
}
