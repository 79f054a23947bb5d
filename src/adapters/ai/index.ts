/**
 * AI adapter selection.
 */

import type { AIConfig } from '../../config';
import type { Log } from '../../utils/logger';
import { GeminiAdapter } from './gemini';
import { OpenRouterAdapter } from './openrouter';
import type { AIAdapter } from './types';

export * from './types';
export { GeminiAdapter } from './gemini';
export { OpenRouterAdapter } from './openrouter';

export function createAIAdapter(
  config: AIConfig,
  log?: Log,
  fetchImpl: typeof fetch = fetch
): AIAdapter {
  switch (config.provider) {
    case 'gemini':
      return new GeminiAdapter(
        {
          apiKey: config.gemini.apiKey,
          model: config.gemini.model,
          baseUrl: config.gemini.baseUrl,
          timeoutMs: config.timeoutMs,
        },
        log,
        fetchImpl
      );
    case 'openrouter':
      return new OpenRouterAdapter(
        {
          apiKey: config.openrouter.apiKey,
          model: config.openrouter.model,
          baseUrl: config.openrouter.baseUrl,
          timeoutMs: config.timeoutMs,
        },
        log,
        fetchImpl
      );
  }
}
