/**
 * AnswerGenerator - prompt construction and language model call
 *
 * A "no context" outcome only ever comes from an empty AssembledContext.
 * Model failures propagate as ProviderError.
 *
 * @module services/generation/answer-generator
 */

import type { GenerationConfig } from '../config.js';
import type { AssembledContext, GeneratedAnswer } from '../../models/retrieval.js';
import { assertNever } from '../../models/document.js';
import { toCitation } from './context.js';
import { toProviderError, type LanguageModelClient } from './llm/client.js';
import { NO_CONTEXT_ANSWER, buildNoContextPrompt, buildTroubleshootingPrompt } from './prompts.js';

export class AnswerGenerator {
  constructor(
    private readonly llm: LanguageModelClient,
    private readonly config: Pick<
      GenerationConfig,
      'temperature' | 'maxTokens' | 'noContextStrategy'
    >
  ) {}

  async generate(question: string, context: AssembledContext): Promise<GeneratedAnswer> {
    switch (context.kind) {
      case 'empty':
        if (this.config.noContextStrategy === 'fixed-answer') {
          console.error('[AnswerGenerator] No context: returning fixed answer');
          return { answer: NO_CONTEXT_ANSWER, sources: [], contextFound: false, model: null };
        }
        {
          const result = await this.call(buildNoContextPrompt(question));
          return { answer: result.text, sources: [], contextFound: false, model: result.model };
        }
      case 'context': {
        const result = await this.call(buildTroubleshootingPrompt(question, context.text));
        return {
          answer: result.text,
          sources: context.included.map(toCitation),
          contextFound: true,
          model: result.model,
        };
      }
      default:
        return assertNever(context);
    }
  }

  private async call(prompt: string): Promise<{ text: string; model: string }> {
    const started = Date.now();
    try {
      const result = await this.llm.generate(prompt, {
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });
      console.error(
        `[AnswerGenerator] ${this.llm.provider}:${result.model} answered in ${Date.now() - started}ms`
      );
      return result;
    } catch (error) {
      throw toProviderError(error, this.llm.provider);
    }
  }
}
