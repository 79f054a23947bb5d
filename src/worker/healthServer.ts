/**
 * Health HTTP server for the worker.
 *
 * GET /health  full report, 503 when unhealthy
 * GET /ready   200 only when healthy or degraded
 */

import type { Server } from 'http';

import express, { type Request, type Response } from 'express';

import { errorMessage, withTimeout } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import type { HealthCheckResult, HealthMonitor, HealthStatus } from './health';
import type { PollerStatus } from './poller';

// =============================================================================
// TYPES
// =============================================================================

export interface DependencyCheck {
  name: string;
  /** A failing critical dependency makes the worker unhealthy; others degrade it */
  critical: boolean;
  /** Null when the dependency is not configured */
  ping: (() => Promise<boolean>) | null;
}

export interface HealthServerDeps {
  monitor: HealthMonitor;
  dependencies: DependencyCheck[];
  poller?: { getStatus(): PollerStatus };
  version: string;
  checkTimeoutMs?: number;
  log?: Log;
}

export interface HealthReport extends HealthCheckResult {
  version: string;
  poller: PollerStatus | null;
}

// =============================================================================
// CHECKS
// =============================================================================

async function runCheck(dependency: DependencyCheck, timeoutMs: number): Promise<{ status: HealthStatus; error?: string }> {
  if (!dependency.ping) {
    return { status: 'degraded', error: 'not configured' };
  }
  const failed: HealthStatus = dependency.critical ? 'unhealthy' : 'degraded';
  const ping = dependency.ping;
  try {
    const reachable = await withTimeout(() => ping(), timeoutMs, `${dependency.name} ping`);
    return reachable ? { status: 'healthy' } : { status: failed, error: 'ping failed' };
  } catch (error) {
    return { status: failed, error: errorMessage(error) };
  }
}

/**
 * Pings every dependency, records the results on the monitor and returns the
 * combined report.
 */
export async function buildHealthReport(deps: HealthServerDeps): Promise<HealthReport> {
  const timeoutMs = deps.checkTimeoutMs ?? 2000;

  const results = await Promise.all(
    deps.dependencies.map(async (dependency) => ({
      name: dependency.name,
      ...(await runCheck(dependency, timeoutMs)),
    }))
  );
  for (const result of results) {
    deps.monitor.updateComponentHealth(result.name, result.status, result.error);
  }

  return {
    ...deps.monitor.getHealthCheck(),
    version: deps.version,
    poller: deps.poller ? deps.poller.getStatus() : null,
  };
}

export function healthStatusCode(status: HealthStatus): number {
  return status === 'unhealthy' ? 503 : 200;
}

export function readinessStatusCode(status: HealthStatus): number {
  return status === 'healthy' || status === 'degraded' ? 200 : 503;
}

// =============================================================================
// SERVER
// =============================================================================

export function createHealthApp(deps: HealthServerDeps): express.Application {
  const app = express();
  const log = (deps.log ?? rootLogger).child({ component: 'health-server' });

  app.get('/health', (_req: Request, res: Response) => {
    buildHealthReport(deps)
      .then((report) => {
        res.status(healthStatusCode(report.status)).json(report);
      })
      .catch((error: unknown) => {
        log.error('Health check failed', { error: errorMessage(error) });
        res.status(503).json({ status: 'unhealthy', error: errorMessage(error) });
      });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    const { status } = deps.monitor.getHealthCheck();
    res.status(readinessStatusCode(status)).json({ status });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Not found' } });
  });

  return app;
}

export function startHealthServer(app: express.Application, port: number, log: Log = rootLogger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info('Health server listening', { port });
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeHealthServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
