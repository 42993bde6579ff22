/**
 * Gemini language model client on @google/genai
 *
 * @module services/generation/llm/gemini
 */

import { GoogleGenAI } from '@google/genai';
import { withRetry } from '../../../utils/backoff.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import {
  ProviderError,
  isTransientProviderError,
  toProviderError,
  type GenerateOptions,
  type GenerateResult,
  type LanguageModelClient,
} from './client.js';

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  requestTimeoutMs: number;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  circuitBreaker: CircuitBreaker;
}

export class GeminiLanguageModelClient implements LanguageModelClient {
  readonly provider = 'gemini';
  readonly model: string;
  private readonly client: GoogleGenAI;

  constructor(private readonly options: GeminiClientOptions) {
    this.model = options.model;
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    return this.options.circuitBreaker.execute(() =>
      withRetry(() => this.callGenerate(prompt, options), isTransientProviderError, {
        ...this.options.retry,
        label: 'GeminiClient',
      })
    );
  }

  /** Looks up the configured model, which needs a valid key */
  async checkHealth(): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    try {
      await this.client.models.get({ model: this.model, config: { abortSignal: controller.signal } });
    } catch (error) {
      throw toProviderError(error, this.provider);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async callGenerate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          temperature: options.temperature,
          maxOutputTokens: options.maxTokens,
          abortSignal: controller.signal,
        },
      });
      const text = response.text;
      if (text === undefined || text.length === 0) {
        throw new ProviderError('Gemini returned no text', 'PROVIDER_ERROR', {
          provider: this.provider,
        });
      }
      return { text, model: this.model };
    } catch (error) {
      throw toProviderError(
        controller.signal.aborted
          ? new ProviderError(
              `gemini request timed out after ${this.options.requestTimeoutMs}ms`,
              'PROVIDER_TIMEOUT',
              { provider: this.provider }
            )
          : error,
        this.provider
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
