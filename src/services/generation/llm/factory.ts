/**
 * Build the language model client selected by LLM_PROVIDER
 *
 * @module services/generation/llm/factory
 */

import { ConfigurationError, type GenerationConfig } from '../../config.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { LanguageModelClient } from './client.js';
import { GeminiLanguageModelClient } from './gemini.js';
import { OllamaLanguageModelClient } from './ollama.js';

export function createLanguageModelClient(
  config: GenerationConfig,
  circuitBreaker: CircuitBreaker = new CircuitBreaker(config.circuitBreaker)
): LanguageModelClient {
  switch (config.provider) {
    case 'ollama':
      return new OllamaLanguageModelClient({
        baseUrl: config.ollamaBaseUrl,
        model: config.model,
        requestTimeoutMs: config.requestTimeoutMs,
        retry: config.retry,
        circuitBreaker,
      });
    case 'gemini':
      if (!config.geminiApiKey) {
        throw new ConfigurationError('GEMINI_API_KEY is required when LLM_PROVIDER=gemini', 'MISSING_API_KEY');
      }
      return new GeminiLanguageModelClient({
        apiKey: config.geminiApiKey,
        model: config.model,
        requestTimeoutMs: config.requestTimeoutMs,
        retry: config.retry,
        circuitBreaker,
      });
  }
}
