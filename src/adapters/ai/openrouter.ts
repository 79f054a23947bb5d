/**
 * OpenRouter Adapter
 *
 * Chat-completions access to any model routed by OpenRouter. The prompt is
 * sent as a single user message.
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
// OpenRouter Types
// ============================================================================

export interface OpenRouterConfig {
  apiKey: string | null;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  rateLimitRpm?: number;
  /** Sent as X-Title for OpenRouter usage attribution */
  appTitle?: string;
}

const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

const ACCEPTED_FINISH_REASONS = new Set(['stop', 'length']);

// ============================================================================
// OpenRouter Adapter Implementation
// ============================================================================

export class OpenRouterAdapter implements AIAdapter {
  readonly provider = 'openrouter' as const;

  private readonly config: Required<Omit<OpenRouterConfig, 'apiKey'>> & { apiKey: string | null };
  private readonly rateLimiter: TokenBucketRateLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Log;

  constructor(config: OpenRouterConfig, log: Log = rootLogger, fetchImpl: typeof fetch = fetch) {
    this.config = {
      apiKey: config.apiKey,
      baseUrl: (config.baseUrl || 'https://openrouter.ai/api/v1').replace(/\/+$/, ''),
      model: config.model || 'openai/gpt-4o-mini',
      timeoutMs: config.timeoutMs ?? 60000,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      rateLimitRpm: config.rateLimitRpm ?? 60,
      appTitle: config.appTitle ?? 'persona-pipeline',
    };
    this.rateLimiter = new TokenBucketRateLimiter(this.config.rateLimitRpm);
    this.fetchImpl = fetchImpl;
    this.log = log.child({ component: 'openrouter' });
  }

  identifier(): string {
    return `OpenRouterAdapter_${this.config.model}`;
  }

  async analyze(
    text: string,
    promptTemplate: string,
    params?: AnalysisParams
  ): Promise<AnalysisResult> {
    if (!this.config.apiKey) {
      return err('client_not_initialized', 'OpenRouter client not initialized: no API key configured');
    }

    const prompt = renderPrompt(promptTemplate, text);
    const parameters = resolveParams(params);

    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: parameters.temperature,
      max_tokens: parameters.max_output_tokens,
    };
    if (parameters.top_p !== null) body.top_p = parameters.top_p;
    if (parameters.top_k !== null) body.top_k = parameters.top_k;

    const response = await postJson(
      { fetchImpl: this.fetchImpl, rateLimiter: this.rateLimiter, log: this.log },
      {
        service: 'OpenRouter',
        url: `${this.config.baseUrl}/chat/completions`,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'X-Title': this.config.appTitle,
        },
        body,
        timeoutMs: this.config.timeoutMs,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
      }
    );
    if (!response.ok) {
      return response;
    }

    const parsed = ChatCompletionResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err('invalid_response', 'OpenRouter response did not match the expected shape');
    }
    const data = parsed.data;

    if (data.error) {
      return err('provider_error', `OpenRouter error: ${data.error.message}`);
    }

    const choice = data.choices[0];
    if (!choice) {
      return err('provider_error', 'OpenRouter returned no choices');
    }

    const finishReason = choice.finish_reason ?? 'unknown';
    if (finishReason === 'content_filter') {
      return err('safety_blocked', 'OpenRouter response blocked: content_filter');
    }
    if (!ACCEPTED_FINISH_REASONS.has(finishReason)) {
      return err('provider_error', `OpenRouter generation stopped with finish reason ${finishReason}`);
    }

    return ok({
      model_output_text: choice.message.content ?? '',
      model_name_used: data.model ?? this.config.model,
      parameters_used: parameters,
      finish_reason: finishReason,
      usage_metadata: {
        prompt_tokens: data.usage?.prompt_tokens ?? null,
        completion_tokens: data.usage?.completion_tokens ?? null,
        total_tokens: data.usage?.total_tokens ?? null,
      },
      prompt_hash: hashPrompt(prompt),
    });
  }
}
