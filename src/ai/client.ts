import Anthropic from '@anthropic-ai/sdk';
import { log } from '../utils/logger.js';
import { errorMessage } from '../utils/shared.js';
import { SYSTEM_PROMPT } from './prompts.js';

export const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

/** Sends one prompt and resolves to the model's raw text. Rejects on any failure. */
export type SuggestionProvider = (prompt: string, signal: AbortSignal) => Promise<string>;

let cachedClient: Anthropic | null = null;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/** Model tokens spent by the providers that share this counter. */
export class TokenCounter {
  private inputTokens = 0;
  private outputTokens = 0;

  record(inputTokens: number, outputTokens: number): void {
    this.inputTokens += inputTokens;
    this.outputTokens += outputTokens;
  }

  usage(): TokenUsage {
    return {
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.inputTokens + this.outputTokens,
    };
  }

  reset(): void {
    this.inputTokens = 0;
    this.outputTokens = 0;
  }
}

export function getClient(): Anthropic | null {
  if (cachedClient) return cachedClient;
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    log.debug('ANTHROPIC_API_KEY not set; keyword suggestions use the static list');
    return null;
  }
  cachedClient = new Anthropic({ apiKey });
  return cachedClient;
}

export interface AnthropicProviderOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Receives the token usage of every reply */
  tokens?: TokenCounter;
}

/**
 * Suggestion provider backed by the Anthropic Messages API, or null when no
 * API key is configured. Timeouts come from the caller's signal.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions = {}): SuggestionProvider | null {
  const client = getClient();
  if (!client) return null;

  const model = options.model ?? process.env.URLSCOUT_MODEL ?? DEFAULT_MODEL;
  const { maxTokens = 1024, temperature = 0.2, tokens } = options;

  return async (prompt, signal) => {
    const message = await client.messages.create(
      {
        model,
        max_tokens: maxTokens,
        temperature,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal },
    );

    if (message.usage && tokens) {
      tokens.record(message.usage.input_tokens, message.usage.output_tokens);
    }

    const textBlock = message.content.find((b) => b.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new Error('Model returned no text content');
    }
    return textBlock.text;
  };
}

/**
 * Parse a JSON response from the model, handling markdown code blocks and truncated JSON.
 */
export function parseJsonResponse(text: string): unknown {
  let jsonStr = text.trim();

  // Handle markdown code blocks
  const jsonMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonMatch) {
    jsonStr = jsonMatch[1].trim();
  }

  // Try to find JSON object if there's text before/after
  if (!jsonStr.startsWith('{') && !jsonStr.startsWith('[')) {
    const startObj = jsonStr.indexOf('{');
    const startArr = jsonStr.indexOf('[');
    const start = startObj === -1 ? startArr : startArr === -1 ? startObj : Math.min(startObj, startArr);
    const endObj = jsonStr.lastIndexOf('}');
    const endArr = jsonStr.lastIndexOf(']');
    const end = Math.max(endObj, endArr);

    if (start !== -1 && end !== -1 && end > start) {
      jsonStr = jsonStr.slice(start, end + 1);
    }
  }

  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return parsed;
  } catch {
    log.debug('JSON parse failed, attempting recovery');
    // Try to recover truncated JSON
    const recovered = tryRecoverTruncatedJson(jsonStr);
    if (recovered) {
      try {
        const parsed: unknown = JSON.parse(recovered);
        return parsed;
      } catch (err2) {
        log.debug(`JSON recovery failed: ${errorMessage(err2)}`);
      }
    }
    log.debug('JSON parse failed and recovery unsuccessful');
    return null;
  }
}

/**
 * Attempt to fix truncated/malformed JSON in model responses.
 * Handles: unclosed brackets, dangling strings, trailing commas.
 */
function tryRecoverTruncatedJson(input: string): string | null {
  let str = input.trim();

  // Remove trailing comma before we close brackets
  str = str.replace(/,\s*$/, '');

  // Track open brackets
  const stack: string[] = [];
  let inString = false;
  let escape = false;

  for (let i = 0; i < str.length; i++) {
    const ch = str[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }

    if (ch === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}') {
      if (stack.length > 0 && stack[stack.length - 1] === '{') stack.pop();
    } else if (ch === ']') {
      if (stack.length > 0 && stack[stack.length - 1] === '[') stack.pop();
    }
  }

  // If nothing is unclosed, no recovery needed (or possible)
  if (stack.length === 0 && !inString) return null;

  // Close dangling string
  if (inString) {
    str += '"';
  }

  // Remove any trailing comma after closing the string
  str = str.replace(/,\s*$/, '');

  // Close unclosed brackets in reverse order
  while (stack.length > 0) {
    const open = stack.pop();
    // Remove trailing comma before closing
    str = str.replace(/,\s*$/, '');
    str += open === '{' ? '}' : ']';
  }

  log.debug('Recovered truncated JSON');
  return str;
}
