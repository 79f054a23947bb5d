/**
 * Pipeline stages, job outcomes and the analysis tasks run per modality.
 */

import type { AnalysisParams } from '../adapters/ai/types';
import type { Modality } from '../types/models';

// =============================================================================
// STAGES
// =============================================================================

export const PIPELINE_STAGES = [
  'FETCH_METADATA',
  'VERIFY_CONSENT',
  'RETRIEVE_AND_DECRYPT',
  'EXTRACT_TEXT',
  'AI_ANALYZE',
  'DERIVE_TRAITS',
  'PERSIST_FEATURES',
  'PERSIST_CANDIDATES',
  'UPDATE_PKG',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

// =============================================================================
// OUTCOMES
// =============================================================================

export type JobStatus = 'SUCCESS' | 'PARTIAL_SUCCESS' | 'FAILED';

export type StoreOutcome = 'written' | 'nothing_to_write' | 'not_configured' | 'failed';

export type SkipKind =
  | 'unsupported_type'
  | 'consent_denied'
  | 'no_text'
  | 'adapter_unavailable'
  | 'adapter_error';

export interface SkippedAnalysis {
  modality: Modality;
  /** Null when the whole modality was skipped */
  task: string | null;
  kind: SkipKind;
  reason: string;
}

export interface PersistenceReport {
  features: StoreOutcome;
  candidates: StoreOutcome;
  graph: StoreOutcome;
}

export interface JobOutcome {
  status: JobStatus;
  packageID: string;
  userID: string;
  completedStages: PipelineStage[];
  failedStage?: PipelineStage;
  /** Whether redelivering the message can help */
  retryable: boolean;
  reason?: string;
  featureSetIDs: string[];
  candidateIDs: string[];
  conceptCount: number;
  skipped: SkippedAnalysis[];
  persistence: PersistenceReport;
  durationMs: number;
}

// =============================================================================
// ANALYSIS TASKS
// =============================================================================

export interface AnalysisTask {
  id: string;
  modality: Modality;
  promptTemplate: string;
  params: AnalysisParams;
}

export const DEFAULT_ANALYSIS_TASKS: readonly AnalysisTask[] = [
  {
    id: 'topics',
    modality: 'text',
    promptTemplate:
      'Extract up to 5 key topics from the following text. List each topic on a new line. Text: {text}',
    params: { max_output_tokens: 200 },
  },
  {
    id: 'style',
    modality: 'text',
    promptTemplate:
      'Describe the writing style of the following text in two or three sentences. ' +
      'Say whether the tone is formal, casual or conversational, and whether it is humorous. Text: {text}',
    params: { max_output_tokens: 200, temperature: 0.3 },
  },
];
