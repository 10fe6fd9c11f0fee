/**
 * Answer Provider Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { CollaboratorUnavailableError } from '../../domain/errors.js';
import {
  ClaudeAnswerProvider,
  FallbackAnswerProvider,
  type AnswerProvider,
} from '../../integrations/llm/AnswerProvider.js';
import { ClaudeClient, type ClaudeResponse } from '../../integrations/llm/ClaudeClient.js';

function claudeResponse(content: string): ClaudeResponse {
  return {
    content,
    model: 'claude-test-model',
    usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    stopReason: 'end_turn',
    latencyMs: 3,
  };
}

function provider(name: string, outcome: string | Error): AnswerProvider & { calls: number } {
  return {
    name,
    calls: 0,
    async answer() {
      this.calls += 1;
      if (outcome instanceof Error) throw outcome;
      return outcome;
    },
  };
}

describe('ClaudeAnswerProvider', () => {
  it('should send the excerpts and question to the configured model', async () => {
    const client = new ClaudeClient({ apiKey: 'test-secret' });
    const chat = jest.spyOn(client, 'chat').mockResolvedValue(claudeResponse('  Jane Doe knows Python.  '));
    const answers = new ClaudeAnswerProvider(client, { model: 'claude-test-model', language: 'English' });

    const answer = await answers.answer('Jane Doe: Python, SQL', 'Who knows Python?');

    expect(answer).toBe('Jane Doe knows Python.');
    expect(answers.name).toBe('claude:claude-test-model');
    expect(chat).toHaveBeenCalledTimes(1);

    const [request] = chat.mock.calls[0];
    expect(request.model).toBe('claude-test-model');
    expect(request.temperature).toBe(0);
    expect(request.prompt).toBe('## Résumé excerpts\nJane Doe: Python, SQL\n\n## Question\nWho knows Python?');
    expect(request.systemPrompt?.endsWith('Answer in English.')).toBe(true);
  });

  it('should report API failures as an unavailable collaborator', async () => {
    const client = new ClaudeClient({ apiKey: 'test-secret' });
    jest.spyOn(client, 'chat').mockRejectedValue(new Error('overloaded'));
    const answers = new ClaudeAnswerProvider(client, { model: 'claude-test-model' });

    const failure = answers.answer('context', 'question');
    await expect(failure).rejects.toBeInstanceOf(CollaboratorUnavailableError);
    await expect(failure).rejects.toThrow('claude:claude-test-model unavailable: overloaded');
  });

  it('should require an API key', () => {
    const previous = process.env.ANTHROPIC_API_KEY;
    delete process.env.ANTHROPIC_API_KEY;
    try {
      expect(() => new ClaudeClient({})).toThrow(CollaboratorUnavailableError);
    } finally {
      if (previous !== undefined) process.env.ANTHROPIC_API_KEY = previous;
    }
  });
});

describe('FallbackAnswerProvider', () => {
  it('should return the first successful answer', async () => {
    const first = provider('primary', new CollaboratorUnavailableError('primary', 'rate limited'));
    const second = provider('secondary', 'an answer');
    const third = provider('tertiary', 'unused');

    const answer = await new FallbackAnswerProvider([first, second, third]).answer('context', 'question');

    expect(answer).toBe('an answer');
    expect([first.calls, second.calls, third.calls]).toEqual([1, 1, 0]);
  });

  it('should fail once every provider has failed', async () => {
    const chain = new FallbackAnswerProvider([
      provider('primary', new Error('timeout')),
      provider('secondary', new Error('overloaded')),
    ]);

    await expect(chain.answer('context', 'question')).rejects.toThrow(
      'LLM unavailable: all providers failed (primary: timeout; secondary: overloaded)'
    );
  });

  it('should fail without providers', async () => {
    await expect(new FallbackAnswerProvider([]).answer('context', 'question')).rejects.toThrow(
      'LLM unavailable: no provider configured'
    );
  });
});
