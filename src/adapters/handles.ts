/**
 * Store Handles
 *
 * Opens every configured store once at startup and closes them on shutdown.
 * A store whose configuration is absent stays null; the pipeline reports it
 * as not configured. A configured store that cannot be reached after retries
 * fails startup.
 */

import type { AppConfig } from '../config';
import { ensureCandidateTable } from '../stores/candidateStore';
import { ExternalServiceError, errorMessage, withRetry } from '../utils/errors';
import type { Log } from '../utils/logger';
import { createMongoHandle, type MongoHandle } from './mongo';
import { createNeo4jAdapter, type Neo4jAdapter } from './neo4j';
import { createPostgresPool, type PostgresPool } from './postgres';

export interface StoreHandles {
  features: MongoHandle | null;
  candidates: PostgresPool | null;
  metadata: PostgresPool | null;
  graph: Neo4jAdapter | null;
}

export interface OpenOptions {
  maxRetries?: number;
  initialDelayMs?: number;
}

function emptyHandles(): StoreHandles {
  return { features: null, candidates: null, metadata: null, graph: null };
}

async function connectWithRetry(
  name: string,
  connect: () => Promise<void>,
  log: Log,
  options: OpenOptions
): Promise<void> {
  try {
    await withRetry(connect, {
      maxRetries: options.maxRetries ?? 3,
      initialDelayMs: options.initialDelayMs ?? 1000,
      onRetry: (error, attempt, delayMs) => {
        log.warn('Store connection failed, retrying', {
          store: name,
          attempt,
          delayMs,
          error: errorMessage(error),
        });
      },
    });
  } catch (error) {
    throw new ExternalServiceError(name, 'unreachable at startup', error instanceof Error ? error : undefined);
  }
}

async function openPostgres(
  name: string,
  pool: PostgresPool,
  log: Log,
  options: OpenOptions
): Promise<void> {
  await connectWithRetry(
    name,
    async () => {
      if (!(await pool.ping())) {
        throw new Error(`${name} ping failed`);
      }
    },
    log,
    options
  );
}

export async function openStoreHandles(
  config: AppConfig,
  log: Log,
  options: OpenOptions = {}
): Promise<StoreHandles> {
  const handles = emptyHandles();

  try {
    if (config.mongo) {
      const mongo = createMongoHandle(config.mongo, log);
      handles.features = mongo;
      await connectWithRetry('feature store', () => mongo.connect(), log, options);
      await mongo.ensureIndexes();
    } else {
      log.warn('Feature store not configured (MONGO_DB_URL unset)');
    }

    if (config.candidateStore) {
      const pool = createPostgresPool(config.candidateStore, 'candidates', log);
      handles.candidates = pool;
      await openPostgres('candidate store', pool, log, options);
      await ensureCandidateTable(pool);
    } else {
      log.warn('Candidate store not configured (POSTGRES_DSN_CANDIDATES unset)');
    }

    if (config.metadataStore) {
      const pool = createPostgresPool(config.metadataStore, 'metadata', log);
      handles.metadata = pool;
      await openPostgres('metadata store', pool, log, options);
    } else {
      log.warn('Package metadata store not configured (POSTGRES_DSN_UDIM_METADATA unset)');
    }

    if (config.neo4j) {
      const graph = createNeo4jAdapter(config.neo4j, log);
      handles.graph = graph;
      await connectWithRetry('knowledge graph', () => graph.connect(), log, options);
      await graph.initializeSchema();
    } else {
      log.warn('Knowledge graph not configured (NEO4J_URI unset)');
    }
  } catch (error) {
    await closeStoreHandles(handles, log);
    throw error;
  }

  return handles;
}

/**
 * Closes every open handle. Close errors are logged, never thrown.
 */
export async function closeStoreHandles(handles: StoreHandles, log: Log): Promise<void> {
  const { features, candidates, metadata, graph } = handles;
  const closers: Array<[string, () => Promise<void>]> = [];
  if (features) closers.push(['feature store', () => features.close()]);
  if (candidates) closers.push(['candidate store', () => candidates.close()]);
  if (metadata) closers.push(['metadata store', () => metadata.close()]);
  if (graph) closers.push(['knowledge graph', () => graph.disconnect()]);

  for (const [name, close] of closers) {
    try {
      await close();
    } catch (error) {
      log.error('Failed to close store', { store: name, error: errorMessage(error) });
    }
  }
}
