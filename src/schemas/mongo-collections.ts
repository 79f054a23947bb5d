/**
 * Feature Store Documents
 *
 * Shape of raw analysis feature sets as stored in MongoDB.
 */

import type { JsonValue } from '../types/common';
import type { FeatureSetStatus, Modality } from '../types/models';

export const FEATURE_COLLECTION = 'raw_analysis_features';

/**
 * `_id` is the featureSetID, so a replayed write replaces the same document.
 */
export interface FeatureSetDocument {
  _id: string;
  featureSetID: string;
  userID: string;
  sourceUserDataPackageID: string;
  modality: Modality;
  modelNameOrType: string;
  analysisTask: string;
  extractedFeatures: Record<string, JsonValue>;
  status: FeatureSetStatus;
  timestamp: Date;
  processingTimeMs: number | null;
  errorDetails: string | null;
  consentTokenIDUsed: string | null;
  requiredScopeForConsent: string | null;
  storedAt: Date;
}

export const FEATURE_COLLECTION_INDEXES = [
  { key: { userID: 1, timestamp: -1 }, name: 'user_timestamp' },
  { key: { sourceUserDataPackageID: 1 }, name: 'source_package' },
] as const;
