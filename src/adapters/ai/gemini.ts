/**
 * Gemini Adapter
 *
 * Calls the Generative Language REST API (`models/{model}:generateContent`).
 * Prompt and response safety blocks surface as `safety_blocked`.
 */

import { z } from 'zod';

import { err, ok } from '../../types/common';
import { logger as rootLogger, type Log } from '../../utils/logger';
import { postJson } from './http';
import { TokenBucketRateLimiter } from './rateLimiter';
import {
  hashPrompt,
  renderPrompt,
  resolveParams,
  type AIAdapter,
  type AnalysisParams,
  type AnalysisResult,
} from './types';

// ============================================================================
// Gemini Types
// ============================================================================

export interface GeminiConfig {
  apiKey: string | null;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  rateLimitRpm?: number;
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

const ACCEPTED_FINISH_REASONS = new Set(['STOP', 'MAX_TOKENS']);
const SAFETY_FINISH_REASONS = new Set(['SAFETY', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII']);

// ============================================================================
// Gemini Adapter Implementation
// ============================================================================

export class GeminiAdapter implements AIAdapter {
  readonly provider = 'gemini' as const;

  private readonly config: Required<Omit<GeminiConfig, 'apiKey'>> & { apiKey: string | null };
  private readonly rateLimiter: TokenBucketRateLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Log;

  constructor(config: GeminiConfig, log: Log = rootLogger, fetchImpl: typeof fetch = fetch) {
    this.config = {
      apiKey: config.apiKey,
      model: config.model || 'gemini-1.5-flash-latest',
      baseUrl: (config.baseUrl || 'https://generativelanguage.googleapis.com/v1beta').replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? 60000,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      rateLimitRpm: config.rateLimitRpm ?? 60,
    };
    this.rateLimiter = new TokenBucketRateLimiter(this.config.rateLimitRpm);
    this.fetchImpl = fetchImpl;
    this.log = log.child({ component: 'gemini' });
  }

  identifier(): string {
    return `GeminiAdapter_${this.config.model}`;
  }

  async analyze(
    text: string,
    promptTemplate: string,
    params?: AnalysisParams
  ): Promise<AnalysisResult> {
    if (!this.config.apiKey) {
      return err('client_not_initialized', 'Gemini client not initialized: no API key configured');
    }

    const prompt = renderPrompt(promptTemplate, text);
    const parameters = resolveParams(params);

    const generationConfig: Record<string, number> = {
      temperature: parameters.temperature,
      maxOutputTokens: parameters.max_output_tokens,
    };
    if (parameters.top_p !== null) generationConfig.topP = parameters.top_p;
    if (parameters.top_k !== null) generationConfig.topK = parameters.top_k;

    const response = await postJson(
      { fetchImpl: this.fetchImpl, rateLimiter: this.rateLimiter, log: this.log },
      {
        service: 'Gemini',
        url: `${this.config.baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`,
        headers: { 'x-goog-api-key': this.config.apiKey },
        body: {
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig,
        },
        timeoutMs: this.config.timeoutMs,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
      }
    );
    if (!response.ok) {
      return response;
    }

    const parsed = GeminiResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err('invalid_response', 'Gemini response did not match the expected shape');
    }
    const data = parsed.data;

    if (data.promptFeedback?.blockReason) {
      return err('safety_blocked', `Gemini prompt blocked: ${data.promptFeedback.blockReason}`);
    }

    const candidate = data.candidates?.[0];
    if (!candidate) {
      return err('provider_error', 'Gemini returned no candidates');
    }

    const finishReason = candidate.finishReason ?? 'FINISH_REASON_UNSPECIFIED';
    if (SAFETY_FINISH_REASONS.has(finishReason)) {
      return err('safety_blocked', `Gemini response blocked: ${finishReason}`);
    }
    if (!ACCEPTED_FINISH_REASONS.has(finishReason)) {
      return err('provider_error', `Gemini generation stopped with finish reason ${finishReason}`);
    }

    const outputText = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');

    return ok({
      model_output_text: outputText,
      model_name_used: data.modelVersion ?? this.config.model,
      parameters_used: parameters,
      finish_reason: finishReason,
      usage_metadata: {
        prompt_tokens: data.usageMetadata?.promptTokenCount ?? null,
        completion_tokens: data.usageMetadata?.candidatesTokenCount ?? null,
        total_tokens: data.usageMetadata?.totalTokenCount ?? null,
      },
      prompt_hash: hashPrompt(prompt),
    });
  }
}
