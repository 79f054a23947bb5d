/**
 * Feature Store Writer
 *
 * Persists raw analysis feature sets. Documents are keyed by featureSetID,
 * so a retried write replaces the earlier document. Store failures are
 * logged and reported as null.
 */

import type { FeatureDocumentStore } from '../adapters/mongo';
import type { FeatureSetDocument } from '../schemas/mongo-collections';
import type { RawAnalysisFeatureSet } from '../types/models';
import { errorMessage, withTimeout } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';

export interface StoreWriterOptions {
  log?: Log;
  /** Bound on a single store call */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15000;

export function toFeatureDocument(
  featureSet: RawAnalysisFeatureSet,
  storedAt: Date = new Date()
): FeatureSetDocument {
  return {
    _id: featureSet.featureSetID,
    featureSetID: featureSet.featureSetID,
    userID: featureSet.userID,
    sourceUserDataPackageID: featureSet.sourceUserDataPackageID,
    modality: featureSet.modality,
    modelNameOrType: featureSet.modelNameOrType,
    analysisTask: featureSet.analysisTask,
    extractedFeatures: featureSet.extractedFeatures,
    status: featureSet.status,
    timestamp: featureSet.timestamp,
    processingTimeMs: featureSet.processingTimeMs ?? null,
    errorDetails: featureSet.errorDetails ?? null,
    consentTokenIDUsed: featureSet.consentTokenIDUsed ?? null,
    requiredScopeForConsent: featureSet.requiredScopeForConsent ?? null,
    storedAt,
  };
}

/**
 * Returns the stored id, or null when there is no store or the write failed.
 */
export async function saveOne(
  store: FeatureDocumentStore | null,
  featureSet: RawAnalysisFeatureSet,
  options: StoreWriterOptions = {}
): Promise<string | null> {
  if (!store) {
    return null;
  }
  const log = (options.log ?? rootLogger).child({ component: 'feature-store' });

  try {
    const id = await withTimeout(
      () => store.upsert(toFeatureDocument(featureSet)),
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      'feature-store.saveOne'
    );
    log.info('Feature set stored', { featureSetID: id });
    return id;
  } catch (error) {
    log.error('Failed to store feature set', {
      featureSetID: featureSet.featureSetID,
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * Returns the stored ids in input order, `[]` for an empty batch, or null
 * when there is no store or the batch failed.
 */
export async function saveBatch(
  store: FeatureDocumentStore | null,
  featureSets: readonly RawAnalysisFeatureSet[],
  options: StoreWriterOptions = {}
): Promise<string[] | null> {
  if (featureSets.length === 0) {
    return [];
  }
  if (!store) {
    return null;
  }
  const log = (options.log ?? rootLogger).child({ component: 'feature-store' });
  const storedAt = new Date();

  try {
    const ids = await withTimeout(
      () => store.upsertMany(featureSets.map((featureSet) => toFeatureDocument(featureSet, storedAt))),
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      'feature-store.saveBatch'
    );
    log.info('Feature set batch stored', { count: ids.length });
    return ids;
  } catch (error) {
    log.error('Failed to store feature set batch', {
      count: featureSets.length,
      error: errorMessage(error),
    });
    return null;
  }
}
