/**
 * Ollama language model client
 *
 * Text generation against a locally running Ollama instance via
 * POST /api/generate. No API key required:
 *   ollama serve
 *   ollama pull llama3.1
 *
 * @module services/generation/llm/ollama
 */

import { z } from 'zod';
import { withRetry } from '../../../utils/backoff.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import {
  ProviderError,
  codeForStatus,
  isTransientProviderError,
  toProviderError,
  type GenerateOptions,
  type GenerateResult,
  type LanguageModelClient,
} from './client.js';

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  circuitBreaker: CircuitBreaker;
  fetchImpl?: typeof fetch;
}

const OllamaTagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export class OllamaLanguageModelClient implements LanguageModelClient {
  readonly provider = 'ollama';
  readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OllamaClientOptions) {
    this.model = options.model;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    return this.options.circuitBreaker.execute(() =>
      withRetry(() => this.callGenerate(prompt, options), isTransientProviderError, {
        ...this.options.retry,
        label: 'OllamaClient',
      })
    );
  }

  /** GET /api/tags, then require the configured model among the pulled ones */
  async checkHealth(): Promise<void> {
    const rawResponse = await this.request('/api/tags', { method: 'GET' });
    const parsed = OllamaTagsResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected tags body', 'PROVIDER_ERROR', {
        provider: this.provider,
      });
    }
    const pulled = parsed.data.models.map((entry) => entry.name);
    if (!pulled.includes(this.model) && !pulled.includes(`${this.model}:latest`)) {
      throw new ProviderError(
        `Ollama model "${this.model}" is not pulled. Run: ollama pull ${this.model}`,
        'PROVIDER_ERROR',
        { provider: this.provider, model: this.model, pulled }
      );
    }
  }

  private async callGenerate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    const rawResponse = await this.request('/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      }),
    });

    const parsed = OllamaGenerateResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected response body', 'PROVIDER_ERROR', {
        provider: this.provider,
        issues: parsed.error.errors.map((e) => e.message),
      });
    }

    const data = parsed.data;
    console.error(
      `[OllamaClient] ${this.model}: ${data.prompt_eval_count ?? 0} prompt tokens, ${data.eval_count ?? 0} output tokens`
    );
    return { text: data.response, model: data.model ?? this.model };
  }

  /** One request under the timeout; non-2xx statuses become ProviderErrors */
  private async request(path: string, init: RequestInit): Promise<Response> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (error) {
      throw toProviderError(error, this.provider);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new ProviderError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        codeForStatus(rawResponse.status),
        { provider: this.provider, status: rawResponse.status }
      );
    }
    return rawResponse;
  }
}
