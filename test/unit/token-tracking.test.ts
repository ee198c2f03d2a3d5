import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createAnthropicProvider, TokenCounter, DEFAULT_MODEL } from '../../src/ai/client.js';

const create = vi.hoisted(() => vi.fn());

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  },
}));

vi.mock('../../src/utils/logger.js', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('Token tracking', () => {
  beforeEach(() => {
    create.mockReset();
    process.env.ANTHROPIC_API_KEY = 'test-secret';
  });

  it('returns zeros initially', () => {
    expect(new TokenCounter().usage()).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
  });

  it('accumulates usage across provider calls', async () => {
    create.mockResolvedValue({
      usage: { input_tokens: 120, output_tokens: 30 },
      content: [{ type: 'text', text: '["about"]' }],
    });
    const tokens = new TokenCounter();
    const provider = createAnthropicProvider({ tokens });
    expect(provider).not.toBeNull();
    if (!provider) return;

    const signal = new AbortController().signal;
    expect(await provider('prompt one', signal)).toBe('["about"]');
    await provider('prompt two', signal);

    expect(tokens.usage()).toEqual({ inputTokens: 240, outputTokens: 60, totalTokens: 300 });
    expect(create).toHaveBeenCalledTimes(2);
    const [body, options] = create.mock.calls[0];
    expect(body).toMatchObject({ model: DEFAULT_MODEL, messages: [{ role: 'user', content: 'prompt one' }] });
    expect(options).toEqual({ signal });
  });

  it('keeps separate counts for providers with separate counters', async () => {
    create.mockResolvedValue({
      usage: { input_tokens: 7, output_tokens: 3 },
      content: [{ type: 'text', text: '[]' }],
    });
    const first = new TokenCounter();
    const second = new TokenCounter();
    const one = createAnthropicProvider({ tokens: first });
    const two = createAnthropicProvider({ tokens: second });
    if (!one || !two) throw new Error('provider missing');

    const signal = new AbortController().signal;
    await one('prompt', signal);
    await one('prompt', signal);
    await two('prompt', signal);

    expect(first.usage().totalTokens).toBe(20);
    expect(second.usage().totalTokens).toBe(10);
  });

  it('rejects when the reply has no text block', async () => {
    create.mockResolvedValue({ usage: { input_tokens: 1, output_tokens: 0 }, content: [] });
    const provider = createAnthropicProvider();
    if (!provider) throw new Error('provider missing');
    await expect(provider('prompt', new AbortController().signal)).rejects.toThrow('Model returned no text content');
  });

  it('reset() clears accumulated tokens', async () => {
    create.mockResolvedValue({
      usage: { input_tokens: 5, output_tokens: 5 },
      content: [{ type: 'text', text: '[]' }],
    });
    const tokens = new TokenCounter();
    const provider = createAnthropicProvider({ tokens });
    if (!provider) throw new Error('provider missing');
    await provider('prompt', new AbortController().signal);
    expect(tokens.usage().totalTokens).toBe(10);
    tokens.reset();
    expect(tokens.usage().totalTokens).toBe(0);
  });
});
