import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MockAPIErrorParams, MockStatusErrorParams, MockOpenAIClient } from './schemas/mock-schemas';

// Hoist the shared spy and error classes so the mock factory can use them
const MOCKS = vi.hoisted(() => {
  class APIError extends Error {
    status: number;
    constructor(params: MockAPIErrorParams) {
      super(params.message);
      this.name = 'APIError';
      this.status = params.status ?? 500;
    }
  }

  class AuthenticationError extends APIError {
    constructor(params: MockStatusErrorParams = {}) {
      super({ message: params.message ?? 'Unauthorized', status: 401 });
      this.name = 'AuthenticationError';
    }
  }

  class RateLimitError extends APIError {
    constructor(params: MockStatusErrorParams = {}) {
      super({ message: params.message ?? 'Rate Limited', status: 429 });
      this.name = 'RateLimitError';
    }
  }

  return { create: vi.fn(), APIError, AuthenticationError, RateLimitError };
});

// Mock OpenAI SDK - must come before importing SUT
vi.mock('openai', () => {
  const { APIError, AuthenticationError, RateLimitError } = MOCKS;
  const openAI = Object.assign(
    vi.fn(function (): MockOpenAIClient {
      return { chat: { completions: { create: MOCKS.create } } };
    }),
    { APIError, AuthenticationError, RateLimitError }
  );

  return {
    __esModule: true,
    default: openAI,
    APIError,
    AuthenticationError,
    RateLimitError,
  };
});

// Now import SUT after mocks are set up
import { OpenAIProvider } from '../src/providers/openai-provider';
import { ProviderError } from '../src/errors/index';

function completion(content: string | null): unknown {
  return {
    choices: [{ message: { content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 100, completion_tokens: 50, total_tokens: 150 },
  };
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('Constructor', () => {
    it('applies default model', () => {
      const provider = new OpenAIProvider({ apiKey: 'test-key' });
      expect(provider.name).toBe('openai');
      expect(provider.modelId).toBe('gpt-4o-mini');
    });

    it('accepts all configuration options', () => {
      const provider = new OpenAIProvider({
        apiKey: 'test-key',
        model: 'gpt-4o',
        temperature: 0.5,
        showPrompt: true,
      });
      expect(provider.modelId).toBe('gpt-4o');
    });
  });

  describe('generateText', () => {
    it('sends the prompt as a single user message and returns trimmed text', async () => {
      MOCKS.create.mockResolvedValue(completion('  {"questions": []}  '));

      const provider = new OpenAIProvider({ apiKey: 'test-key' });
      const result = await provider.generateText('Quiz me');

      expect(result).toEqual({
        data: '{"questions": []}',
        usage: { inputTokens: 100, outputTokens: 50 },
      });
      expect(MOCKS.create).toHaveBeenCalledWith(
        {
          model: 'gpt-4o-mini',
          messages: [{ role: 'user', content: 'Quiz me' }],
          temperature: 0.2,
        },
        {}
      );
    });

    it('forwards the abort signal', async () => {
      MOCKS.create.mockResolvedValue(completion('ok'));
      const controller = new AbortController();

      const provider = new OpenAIProvider({ apiKey: 'test-key', temperature: 0.7 });
      await provider.generateText('Quiz me', { signal: controller.signal });

      expect(MOCKS.create).toHaveBeenCalledWith(
        expect.objectContaining({ temperature: 0.7 }),
        { signal: controller.signal }
      );
    });

    it('omits usage when the API does not report it', async () => {
      MOCKS.create.mockResolvedValue({ choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }] });

      const provider = new OpenAIProvider({ apiKey: 'test-key' });
      const result = await provider.generateText('Quiz me');

      expect(result.usage).toBeUndefined();
    });

    it('rejects empty content', async () => {
      MOCKS.create.mockResolvedValue(completion(null));

      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.generateText('Quiz me')).rejects.toThrow('Empty response from OpenAI API (no content).');
    });

    it('rejects a response without choices', async () => {
      MOCKS.create.mockResolvedValue({ choices: [] });

      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.generateText('Quiz me')).rejects.toThrow(/Invalid OpenAI API response structure/);
    });
  });

  describe('Error Handling', () => {
    it('maps rate limit errors to status 429', async () => {
      MOCKS.create.mockRejectedValue(new MOCKS.RateLimitError());

      const provider = new OpenAIProvider({ apiKey: 'test-key' });
      const error: unknown = await provider.generateText('Quiz me').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({
        message: 'OpenAI rate limit exceeded: Rate Limited',
        provider: 'openai',
        status: 429,
      });
    });

    it('maps authentication errors to status 401', async () => {
      MOCKS.create.mockRejectedValue(new MOCKS.AuthenticationError({ message: 'Invalid API key' }));

      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.generateText('Quiz me')).rejects.toMatchObject({
        message: 'OpenAI authentication failed: Invalid API key',
        status: 401,
      });
    });

    it('keeps the status of other API errors', async () => {
      MOCKS.create.mockRejectedValue(new MOCKS.APIError({ message: 'Service unavailable', status: 503 }));

      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.generateText('Quiz me')).rejects.toMatchObject({
        message: 'OpenAI API error (503): Service unavailable',
        status: 503,
      });
    });

    it('wraps unknown errors', async () => {
      MOCKS.create.mockRejectedValue(new Error('socket hang up'));

      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.generateText('Quiz me')).rejects.toMatchObject({
        message: 'OpenAI API call failed: socket hang up',
        status: undefined,
      });
    });
  });
});
