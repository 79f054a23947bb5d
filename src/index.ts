/**
 * Persona Analysis Pipeline - Worker Entry Point
 *
 * 1. Loads application and worker configuration
 * 2. Opens the feature, candidate, metadata and graph stores
 * 3. Wires consent, data access, AI adapter and PKG writer into the orchestrator
 * 4. Starts the health server and the queue poller
 * 5. On SIGINT/SIGTERM stops polling, then closes the server and the stores
 */

import type { Server } from 'http';

import { createAIAdapter } from './adapters/ai';
import { closeStoreHandles, openStoreHandles, type StoreHandles } from './adapters/handles';
import {
  getLoggableAppConfig,
  loadAppConfig,
  validateAppConfig,
  type AppConfig,
} from './config';
import { createConsentGate } from './consent/consentGate';
import { S3ObjectFetcher, UdimDataAccess } from './data/udimDataAccess';
import { createPkgWriter } from './graph/pkgWriter';
import { createJobOrchestrator, type JobOrchestrator } from './pipeline/orchestrator';
import { ConfigurationError, errorMessage } from './utils/errors';
import { createLogger, type Log } from './utils/logger';
import {
  getLoggableConfig,
  loadWorkerConfig,
  validateWorkerConfig,
  type WorkerConfig,
} from './worker/config';
import { HealthMonitor } from './worker/health';
import {
  closeHealthServer,
  createHealthApp,
  startHealthServer,
  type DependencyCheck,
} from './worker/healthServer';
import { QueuePoller } from './worker/poller';
import { JobProcessor } from './worker/processor';
import { SqsQueueAdapter, type QueueAdapter } from './worker/queue';

const VERSION = '1.0.0';

// =============================================================================
// COMPOSITION
// =============================================================================

export interface WorkerComponents {
  orchestrator: JobOrchestrator;
  monitor: HealthMonitor;
  processor: JobProcessor;
  poller: QueuePoller;
  dependencies: DependencyCheck[];
}

/**
 * Builds the orchestrator and worker around already opened store handles.
 */
export function buildWorker(
  config: AppConfig,
  workerConfig: WorkerConfig,
  handles: StoreHandles,
  queue: QueueAdapter,
  objects: S3ObjectFetcher,
  log: Log
): WorkerComponents {
  const orchestrator = createJobOrchestrator(
    {
      dataAccess: new UdimDataAccess(handles.metadata, objects, log),
      consent: createConsentGate(config.consent, log),
      aiAdapter: createAIAdapter(config.ai, log),
      featureStore: handles.features,
      candidatePool: handles.candidates,
      pkgWriter: createPkgWriter(handles.graph, { log }),
    },
    {
      log,
      aiTimeoutMs: config.ai.timeoutMs,
      storeWriteTimeoutMs: config.storeWriteTimeoutMs,
    }
  );

  const monitor = new HealthMonitor(workerConfig.workerId);
  const processor = new JobProcessor(workerConfig, queue, orchestrator, monitor, log);
  const poller = new QueuePoller(workerConfig, queue, processor, monitor, log);

  const { features, candidates, metadata, graph } = handles;
  const dependencies: DependencyCheck[] = [
    { name: 'metadata-store', critical: true, ping: metadata ? () => metadata.ping() : null },
    { name: 'feature-store', critical: false, ping: features ? () => features.ping() : null },
    { name: 'candidate-store', critical: false, ping: candidates ? () => candidates.ping() : null },
    {
      name: 'knowledge-graph',
      critical: false,
      ping: graph ? async () => (await graph.healthCheck()).healthy : null,
    },
  ];

  return { orchestrator, monitor, processor, poller, dependencies };
}

// =============================================================================
// MAIN ENTRY POINT
// =============================================================================

async function main(): Promise<void> {
  const config = loadAppConfig();
  const log = createLogger(config.serviceName, config.logLevel);
  const workerConfig = loadWorkerConfig();

  log.info('Starting persona analysis worker', {
    version: VERSION,
    config: getLoggableAppConfig(config),
    worker: getLoggableConfig(workerConfig),
  });

  for (const result of [validateAppConfig(config), validateWorkerConfig(workerConfig)]) {
    for (const warning of result.warnings) {
      log.warn('Configuration warning', { warning });
    }
    if (!result.valid) {
      throw new ConfigurationError('Invalid configuration', { errors: result.errors });
    }
  }

  const handles = await openStoreHandles(config, log);
  const queue = new SqsQueueAdapter(
    {
      queueUrl: workerConfig.queueUrl,
      region: config.aws.region,
      endpoint: config.aws.endpoint,
      waitTimeSeconds: workerConfig.waitTimeSeconds,
      visibilityTimeoutSeconds: workerConfig.visibilityTimeoutSeconds,
    },
    log
  );
  const objects = new S3ObjectFetcher({ region: config.aws.region, endpoint: config.aws.endpoint });

  const { monitor, poller, dependencies } = buildWorker(config, workerConfig, handles, queue, objects, log);

  let server: Server;
  try {
    server = await startHealthServer(
      createHealthApp({ monitor, dependencies, poller, version: VERSION, log }),
      config.healthPort,
      log
    );
  } catch (error) {
    await closeStoreHandles(handles, log);
    throw error;
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, initiating graceful shutdown`);

    await poller.stop();
    try {
      await closeHealthServer(server);
    } catch (error) {
      log.error('Failed to close health server', { error: errorMessage(error) });
    }
    queue.destroy();
    objects.destroy();
    await closeStoreHandles(handles, log);
    log.info('Shutdown complete');
  };

  const onSignal = (signal: string) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled rejection', { reason: String(reason) });
  });

  poller.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    createLogger('persona-pipeline', 'error').error('Fatal error starting worker', {
      error: errorMessage(error),
    });
    process.exit(1);
  });
}

export { main };
