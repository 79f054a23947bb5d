/**
 * Pipeline Data Model
 *
 * Jobs, raw analysis feature sets and trait candidates as they move through
 * the pipeline and into the stores.
 */

import type { JsonValue } from './common';

// =============================================================================
// INGESTION JOB
// =============================================================================

/**
 * A "data package ready" event. Immutable once parsed from the queue.
 */
export interface IngestionJob {
  packageID: string;
  userID: string;
  /** Null when the message carried none; the package's own token is used instead */
  consentTokenID: string | null;
  /** Opaque storage locator, e.g. `s3://bucket/key` */
  rawDataReference: string;
  /** MIME type of the stored package */
  dataType: string;
  sourceDescription: string | null;
  metadata: Record<string, JsonValue>;
  /** Queue message id, used for log correlation only */
  sqsMessageId?: string;
}

// =============================================================================
// MODALITIES
// =============================================================================

export type Modality = 'text' | 'audio' | 'image' | 'video';

// =============================================================================
// RAW ANALYSIS FEATURE SET
// =============================================================================

export type FeatureSetStatus =
  | 'success'
  | 'failure_consent_denied'
  | 'failure_adapter_error';

/**
 * Output of one AI analysis over one modality of one package.
 */
export interface RawAnalysisFeatureSet {
  /** Deterministic per (package, task, model) */
  featureSetID: string;
  userID: string;
  sourceUserDataPackageID: string;
  modality: Modality;
  /** Adapter identifier, e.g. `GeminiAdapter_gemini-1.5-flash-latest` */
  modelNameOrType: string;
  /** Analysis task that produced the output, e.g. `topics` */
  analysisTask: string;
  /** Model-specific payload; `model_output_text` is the field rules read */
  extractedFeatures: Record<string, JsonValue>;
  status: FeatureSetStatus;
  timestamp: Date;
  processingTimeMs?: number;
  errorDetails?: string;
  consentTokenIDUsed?: string;
  requiredScopeForConsent?: string;
}

// =============================================================================
// TRAIT CANDIDATES
// =============================================================================

export const TRAIT_CATEGORIES = [
  'LinguisticStyle',
  'EmotionalResponsePattern',
  'KnowledgeDomain',
  'PhilosophicalStance',
  'CommunicationStyle',
  'BehavioralPattern',
  'Interest',
  'Skill',
  'Other',
] as const;

export type TraitCategory = (typeof TRAIT_CATEGORIES)[number];

export const CANDIDATE_STATUSES = [
  'candidate',
  'confirmed_by_user',
  'rejected_by_user',
  'modified_by_user',
] as const;

export type CandidateStatus = (typeof CANDIDATE_STATUSES)[number];

export interface EvidenceSnippet {
  /** e.g. `text_analysis_output_summary`, `user_provided_text` */
  type: string;
  content: string;
  sourcePackageID: string | null;
  /** Model identifier or other provenance note */
  sourceDetail: string | null;
  relevanceScore?: number;
}

export interface ExtractedTraitCandidate {
  candidateID: string;
  userID: string;
  traitName: string;
  traitDescription: string;
  traitCategory: TraitCategory;
  supportingEvidenceSnippets: EvidenceSnippet[];
  /** In [0, 1]; the maximum across merged derivations */
  confidenceScore: number;
  originatingModels: string[];
  associatedFeatureSetIDs: string[];
  status: CandidateStatus;
  creationTimestamp: Date;
  lastUpdatedTimestamp: Date;
}

// =============================================================================
// CONCEPTS
// =============================================================================

/**
 * A concept mentioned by the user in one package.
 */
export interface MentionedConcept {
  name: string;
  frequency: number;
  /** In [-1, 1] when known */
  sentiment?: number;
}
