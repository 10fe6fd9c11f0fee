/**
 * Answer Providers - Question answering over retrieved résumé excerpts
 *
 * `FallbackAnswerProvider` tries its providers in order (for instance one
 * Claude model after another) and reports the LLM as unavailable only when
 * every one of them failed.
 */

import { CollaboratorUnavailableError, errorMessage } from '../../domain/errors.js';
import type { ClaudeClient } from './ClaudeClient.js';
import { RETRIEVAL_QA_PROMPTS, buildPromptPair } from './PromptTemplates.js';

export interface AnswerProvider {
  readonly name: string;
  answer(context: string, question: string): Promise<string>;
}

// =============================================================================
// CLAUDE
// =============================================================================

export interface ClaudeAnswerProviderConfig {
  model: string;
  language: string;
  maxTokens: number;
}

export class ClaudeAnswerProvider implements AnswerProvider {
  private config: ClaudeAnswerProviderConfig;

  constructor(
    private readonly client: ClaudeClient,
    config: Partial<ClaudeAnswerProviderConfig> = {}
  ) {
    this.config = {
      model: client.defaultModel,
      language: 'French',
      maxTokens: 1024,
      ...config,
    };
  }

  get name(): string {
    return `claude:${this.config.model}`;
  }

  async answer(context: string, question: string): Promise<string> {
    const prompt = buildPromptPair(RETRIEVAL_QA_PROMPTS.answer, {
      context,
      question,
      language: this.config.language,
    });

    try {
      const response = await this.client.chat({
        prompt: prompt.user,
        systemPrompt: prompt.system,
        model: this.config.model,
        maxTokens: this.config.maxTokens,
        temperature: 0,
      });
      return response.content.trim();
    } catch (error) {
      throw new CollaboratorUnavailableError(this.name, errorMessage(error), error);
    }
  }
}

// =============================================================================
// FALLBACK CHAIN
// =============================================================================

export class FallbackAnswerProvider implements AnswerProvider {
  readonly name = 'fallback';

  constructor(private readonly providers: AnswerProvider[]) {}

  async answer(context: string, question: string): Promise<string> {
    const failures: string[] = [];

    for (const provider of this.providers) {
      try {
        return await provider.answer(context, question);
      } catch (error) {
        console.warn(`[AnswerProvider] ${provider.name} failed: ${errorMessage(error)}`);
        failures.push(`${provider.name}: ${errorMessage(error)}`);
      }
    }

    throw new CollaboratorUnavailableError(
      'LLM',
      failures.length > 0 ? `all providers failed (${failures.join('; ')})` : 'no provider configured'
    );
  }
}
