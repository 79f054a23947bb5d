/**
 * AI Adapter Contract
 *
 * Every provider turns (text, prompt template, generation params) into an
 * `AnalysisOutput` or a typed error. Adapters never throw for provider-side
 * failures.
 */

import { createHash } from 'crypto';

import type { AIProvider } from '../../config';
import type { Result } from '../../types/common';

// =============================================================================
// ERROR KINDS
// =============================================================================

export type AdapterErrorKind =
  | 'client_not_initialized'
  | 'safety_blocked'
  | 'quota_exceeded'
  | 'provider_error'
  | 'timeout'
  | 'invalid_response';

// =============================================================================
// PARAMETERS & OUTPUT
// =============================================================================

export interface AnalysisParams {
  temperature?: number;
  max_output_tokens?: number;
  top_p?: number;
  top_k?: number;
}

export type ResolvedParams = {
  temperature: number;
  max_output_tokens: number;
  top_p: number | null;
  top_k: number | null;
};

export type UsageMetadata = {
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
};

/**
 * Stored verbatim as a feature set's `extractedFeatures`, hence snake_case and
 * a type alias (plain JSON, no index-signature mismatch).
 */
export type AnalysisOutput = {
  model_output_text: string;
  model_name_used: string;
  parameters_used: ResolvedParams;
  finish_reason: string;
  usage_metadata: UsageMetadata;
  /** sha256 of the rendered prompt */
  prompt_hash: string;
};

export type AnalysisResult = Result<AnalysisOutput, AdapterErrorKind>;

// =============================================================================
// ADAPTER INTERFACE
// =============================================================================

export interface AIAdapter {
  readonly provider: AIProvider;

  /** Stable id recorded on feature sets, `<AdapterClass>_<model>` */
  identifier(): string;

  analyze(text: string, promptTemplate: string, params?: AnalysisParams): Promise<AnalysisResult>;
}

// =============================================================================
// HELPERS
// =============================================================================

export const DEFAULT_TEMPERATURE = 0.5;
export const DEFAULT_MAX_OUTPUT_TOKENS = 1024;

/**
 * Substitutes every `{text}` placeholder. A template without one gets the
 * text appended after a blank line.
 */
export function renderPrompt(template: string, text: string): string {
  if (!template.includes('{text}')) {
    return `${template}\n\n${text}`;
  }
  return template.split('{text}').join(text);
}

export function hashPrompt(prompt: string): string {
  return createHash('sha256').update(prompt, 'utf8').digest('hex');
}

export function resolveParams(params: AnalysisParams = {}): ResolvedParams {
  return {
    temperature: params.temperature ?? DEFAULT_TEMPERATURE,
    max_output_tokens: params.max_output_tokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
    top_p: params.top_p ?? null,
    top_k: params.top_k ?? null,
  };
}
