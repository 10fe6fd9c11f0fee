/**
 * Claude Client - LLM integration for retrieval QA
 *
 * Thin wrapper over the Anthropic SDK: one prompt in, text content out,
 * with usage and latency recorded on each response.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Message, MessageParam, TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { CollaboratorUnavailableError } from '../../domain/errors.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ClaudeClientConfig {
  apiKey: string;
  defaultModel: string;
  maxRetries: number;
  timeoutMs: number;
}

export const DEFAULT_CLAUDE_MODEL = 'claude-3-5-haiku-20241022';

const DEFAULT_CONFIG: Omit<ClaudeClientConfig, 'apiKey'> = {
  defaultModel: DEFAULT_CLAUDE_MODEL,
  maxRetries: 2,
  timeoutMs: 60000,
};

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface ClaudeRequest {
  prompt: string;
  systemPrompt?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ClaudeResponse {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  stopReason: string | null;
  latencyMs: number;
}

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

export class ClaudeClient {
  private client: Anthropic;
  private config: ClaudeClientConfig;

  constructor(config: Partial<ClaudeClientConfig>) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY || '',
    };

    if (!this.config.apiKey) {
      throw new CollaboratorUnavailableError('Claude', 'ANTHROPIC_API_KEY is required');
    }

    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      maxRetries: this.config.maxRetries,
      timeout: this.config.timeoutMs,
    });
  }

  get defaultModel(): string {
    return this.config.defaultModel;
  }

  async chat(request: ClaudeRequest): Promise<ClaudeResponse> {
    const startTime = Date.now();

    const messages: MessageParam[] = [
      {
        role: 'user',
        content: request.prompt,
      },
    ];

    const response: Message = await this.client.messages.create({
      model: request.model || this.config.defaultModel,
      max_tokens: request.maxTokens || 1024,
      system: request.systemPrompt,
      messages,
      temperature: request.temperature,
    });

    const textContent = response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      content: textContent,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      stopReason: response.stop_reason,
      latencyMs: Date.now() - startTime,
    };
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let clientInstance: ClaudeClient | null = null;

export function getClaudeClient(config?: Partial<ClaudeClientConfig>): ClaudeClient {
  if (!clientInstance) {
    clientInstance = new ClaudeClient(config || {});
  }
  return clientInstance;
}
