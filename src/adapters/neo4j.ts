/**
 * Neo4j Adapter
 *
 * Driver lifecycle, schema initialization and the single write path used by
 * the PKG writer. Every mutation runs in its own managed write transaction so
 * the driver retries transient cluster errors for us.
 */

import neo4j, { Driver, Session } from 'neo4j-driver';

import type { ConnectionStatus } from '../types/common';
import { GraphWriteError, errorMessage, withTimeout } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import { SCHEMA_CREATION_QUERIES, type GraphMutation } from '../schemas/neo4j-graph';

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Neo4j connection configuration.
 */
export interface Neo4jConfig {
  /** Neo4j URI (bolt:// or neo4j://) */
  uri: string;

  /** Username */
  username: string;

  /** Password */
  password: string;

  /** Database name (default: neo4j) */
  database?: string;

  /** Connection pool size */
  maxConnectionPoolSize?: number;

  /** Connection acquisition timeout in milliseconds */
  connectionAcquisitionTimeout?: number;

  /** Server-side transaction timeout in milliseconds */
  transactionTimeoutMs?: number;
}

const DEFAULT_CONFIG = {
  database: 'neo4j',
  maxConnectionPoolSize: 50,
  connectionAcquisitionTimeout: 30000,
  transactionTimeoutMs: 15000,
};

// =============================================================================
// GRAPH WRITER CONTRACT
// =============================================================================

export type GraphRecord = Record<string, unknown>;

/**
 * The only way the PKG writer touches the graph. Implementations must throw
 * `GraphWriteError` on failure.
 */
export interface GraphWriter {
  runIdempotentWrite(
    mutation: GraphMutation,
    params: Record<string, unknown>
  ): Promise<GraphRecord[]>;
}

// =============================================================================
// NEO4J ADAPTER CLASS
// =============================================================================

export class Neo4jAdapter implements GraphWriter {
  private config: Neo4jConfig & typeof DEFAULT_CONFIG;
  private driver: Driver | null = null;
  private connectionStatus: ConnectionStatus = { connected: false };
  private log: Log;

  constructor(config: Neo4jConfig, log: Log = rootLogger) {
    this.config = {
      ...config,
      database: config.database ?? DEFAULT_CONFIG.database,
      maxConnectionPoolSize: config.maxConnectionPoolSize ?? DEFAULT_CONFIG.maxConnectionPoolSize,
      connectionAcquisitionTimeout:
        config.connectionAcquisitionTimeout ?? DEFAULT_CONFIG.connectionAcquisitionTimeout,
      transactionTimeoutMs: config.transactionTimeoutMs ?? DEFAULT_CONFIG.transactionTimeoutMs,
    };
    this.log = log.child({ component: 'neo4j' });
  }

  // ===========================================================================
  // CONNECTION MANAGEMENT
  // ===========================================================================

  async connect(): Promise<void> {
    try {
      this.driver = neo4j.driver(
        this.config.uri,
        neo4j.auth.basic(this.config.username, this.config.password),
        {
          maxConnectionPoolSize: this.config.maxConnectionPoolSize,
          connectionAcquisitionTimeout: this.config.connectionAcquisitionTimeout,
        }
      );
      await this.driver.verifyConnectivity();

      this.connectionStatus = {
        connected: true,
        lastConnectedAt: Date.now(),
      };

      this.log.info('Connected to Neo4j', {
        uri: this.config.uri,
        database: this.config.database,
      });
    } catch (error) {
      this.connectionStatus = {
        connected: false,
        error: errorMessage(error),
      };
      if (this.driver) {
        await this.driver.close();
        this.driver = null;
      }
      throw new Error(`Neo4j connection failed: ${this.connectionStatus.error}`);
    }
  }

  async disconnect(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
    this.connectionStatus = { connected: false };
    this.log.info('Disconnected from Neo4j');
  }

  getConnectionStatus(): ConnectionStatus {
    return { ...this.connectionStatus };
  }

  private getSession(): Session {
    if (!this.driver) {
      throw new Error('Neo4j adapter is not connected');
    }
    return this.driver.session({
      database: this.config.database,
      defaultAccessMode: neo4j.session.WRITE,
    });
  }

  // ===========================================================================
  // SCHEMA INITIALIZATION
  // ===========================================================================

  /**
   * Creates constraints and indexes. Each statement is `IF NOT EXISTS`, so a
   * failure here is logged and the remaining statements still run.
   */
  async initializeSchema(): Promise<void> {
    const session = this.getSession();

    try {
      const statements = [
        ...SCHEMA_CREATION_QUERIES.constraints,
        ...SCHEMA_CREATION_QUERIES.indexes,
      ];
      for (const statement of statements) {
        try {
          await session.run(statement);
        } catch (error) {
          this.log.warn('Schema statement failed', {
            statement: statement.replace(/\s+/g, ' ').trim(),
            error: errorMessage(error),
          });
        }
      }

      this.log.info('PKG schema initialized');
    } finally {
      await session.close();
    }
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  async runIdempotentWrite(
    mutation: GraphMutation,
    params: Record<string, unknown>
  ): Promise<GraphRecord[]> {
    let session: Session;
    try {
      session = this.getSession();
    } catch (error) {
      throw new GraphWriteError(mutation.cypher, errorMessage(error), {
        mutation: mutation.name,
      });
    }

    try {
      const result = await withTimeout(
        () =>
          session.executeWrite(async (tx) => tx.run(mutation.cypher, params), {
            timeout: this.config.transactionTimeoutMs,
          }),
        // Client-side bound sits above the server timeout to cover lock waits
        this.config.transactionTimeoutMs + 5000,
        `neo4j.${mutation.name}`
      );

      this.log.debug('Graph write committed', { mutation: mutation.name });
      return result.records.map((record) => toPlainRecord(record.toObject()));
    } catch (error) {
      throw new GraphWriteError(mutation.cypher, errorMessage(error), {
        mutation: mutation.name,
      });
    } finally {
      await session.close();
    }
  }

  // ===========================================================================
  // HEALTH CHECK
  // ===========================================================================

  async healthCheck(): Promise<{ healthy: boolean; error?: string }> {
    if (!this.driver) {
      return { healthy: false, error: 'not connected' };
    }
    try {
      await this.driver.verifyConnectivity();
      return { healthy: true };
    } catch (error) {
      return { healthy: false, error: errorMessage(error) };
    }
  }
}

// =============================================================================
// VALUE CONVERSION
// =============================================================================

/**
 * Converts driver integers to JS numbers so callers see plain values.
 */
function toPlainRecord(record: Record<string, unknown>): GraphRecord {
  const plain: GraphRecord = {};
  for (const [key, value] of Object.entries(record)) {
    plain[key] = neo4j.isInt(value) ? value.toNumber() : value;
  }
  return plain;
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

export function createNeo4jAdapter(config: Neo4jConfig, log?: Log): Neo4jAdapter {
  return new Neo4jAdapter(config, log);
}
