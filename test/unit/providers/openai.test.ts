import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => {
  class MockOpenAI {
    chat = { completions: { create } };
  }
  return { default: MockOpenAI };
});

import { OpenAICompletionProvider } from '../../../src/providers/openai.js';

describe('OpenAICompletionProvider', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('should send the system prompt and request a JSON object', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{"confidence": "High"}' } }] });
    const provider = new OpenAICompletionProvider({ apiKey: 'test-key' });

    const text = await provider.complete({ prompt: 'size this', system: 'be brief', maxTokens: 300, json: true });

    expect(text).toBe('{"confidence": "High"}');
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'size this' },
      ],
      max_tokens: 300,
      response_format: { type: 'json_object' },
    });
  });

  it('should return an empty string when there is no choice', async () => {
    create.mockResolvedValue({ choices: [] });
    const provider = new OpenAICompletionProvider({ apiKey: 'test-key' });

    expect(await provider.complete({ prompt: 'p', maxTokens: 10 })).toBe('');
  });
});
