/**
 * MongoDB Adapter
 *
 * Client lifecycle plus the document-store contract the feature store writer
 * depends on.
 */

import { MongoClient, type Collection } from 'mongodb';

import type { ConnectionStatus } from '../types/common';
import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import {
  FEATURE_COLLECTION,
  FEATURE_COLLECTION_INDEXES,
  type FeatureSetDocument,
} from '../schemas/mongo-collections';

// =============================================================================
// CONTRACT
// =============================================================================

/**
 * Replace-or-insert keyed by `_id`. Both methods throw on store errors.
 */
export interface FeatureDocumentStore {
  upsert(document: FeatureSetDocument): Promise<string>;
  upsertMany(documents: FeatureSetDocument[]): Promise<string[]>;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface MongoConfig {
  url: string;
  database: string;
  /** Server selection and socket bound in milliseconds */
  timeoutMs?: number;
}

// =============================================================================
// MONGO HANDLE
// =============================================================================

export class MongoHandle implements FeatureDocumentStore {
  private client: MongoClient;
  private config: MongoConfig;
  private collection: Collection<FeatureSetDocument> | null = null;
  private connectionStatus: ConnectionStatus = { connected: false };
  private log: Log;

  constructor(config: MongoConfig, log: Log = rootLogger) {
    this.config = config;
    this.log = log.child({ component: 'mongo' });
    const timeoutMs = config.timeoutMs ?? 10000;
    this.client = new MongoClient(config.url, {
      serverSelectionTimeoutMS: timeoutMs,
      socketTimeoutMS: timeoutMs,
      connectTimeoutMS: timeoutMs,
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      const db = this.client.db(this.config.database);
      await db.command({ ping: 1 });
      this.collection = db.collection<FeatureSetDocument>(FEATURE_COLLECTION);
      this.connectionStatus = { connected: true, lastConnectedAt: Date.now() };
      this.log.info('Connected to MongoDB', { database: this.config.database });
    } catch (error) {
      this.connectionStatus = { connected: false, error: errorMessage(error) };
      throw new Error(`MongoDB connection failed: ${this.connectionStatus.error}`);
    }
  }

  async ensureIndexes(): Promise<void> {
    const collection = this.getCollection();
    for (const index of FEATURE_COLLECTION_INDEXES) {
      await collection.createIndex({ ...index.key }, { name: index.name });
    }
  }

  getConnectionStatus(): ConnectionStatus {
    return { ...this.connectionStatus };
  }

  private getCollection(): Collection<FeatureSetDocument> {
    if (!this.collection) {
      throw new Error('MongoDB handle is not connected');
    }
    return this.collection;
  }

  async upsert(document: FeatureSetDocument): Promise<string> {
    const { _id, ...replacement } = document;
    await this.getCollection().replaceOne({ _id }, replacement, { upsert: true });
    return _id;
  }

  async upsertMany(documents: FeatureSetDocument[]): Promise<string[]> {
    if (documents.length === 0) {
      return [];
    }
    const operations = documents.map((document) => {
      const { _id, ...replacement } = document;
      return { replaceOne: { filter: { _id }, replacement, upsert: true } };
    });
    const result = await this.getCollection().bulkWrite(operations, { ordered: false });
    this.log.debug('Feature documents written', {
      upserted: result.upsertedCount,
      modified: result.modifiedCount,
      matched: result.matchedCount,
    });
    return documents.map((document) => document._id);
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.db(this.config.database).command({ ping: 1 });
      return true;
    } catch (error) {
      this.log.warn('MongoDB ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
    this.collection = null;
    this.connectionStatus = { connected: false };
    this.log.info('MongoDB client closed');
  }
}

export function createMongoHandle(config: MongoConfig, log?: Log): MongoHandle {
  return new MongoHandle(config, log);
}
