import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MockGeminiClient } from './schemas/mock-schemas';

const MOCKS = vi.hoisted(() => {
  class GoogleGenerativeAIFetchError extends Error {
    constructor(message: string, public status?: number) {
      super(message);
      this.name = 'GoogleGenerativeAIFetchError';
    }
  }

  return {
    generateContent: vi.fn(),
    getGenerativeModel: vi.fn(),
    GoogleGenerativeAIFetchError,
  };
});

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: vi.fn(function (): MockGeminiClient {
    return { getGenerativeModel: MOCKS.getGenerativeModel };
  }),
  GoogleGenerativeAIFetchError: MOCKS.GoogleGenerativeAIFetchError,
}));

import { GeminiProvider } from '../src/providers/gemini-provider';
import { ProviderError } from '../src/errors/index';

function geminiResult(text: string, usage?: { promptTokenCount: number; candidatesTokenCount: number }): unknown {
  return { response: { text: () => text, usageMetadata: usage } };
}

describe('GeminiProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    MOCKS.getGenerativeModel.mockReturnValue({ generateContent: MOCKS.generateContent });
  });

  it('uses the flash-lite model by default', () => {
    const provider = new GeminiProvider({ apiKey: 'test-key' });

    expect(provider.modelId).toBe('gemini-2.5-flash-lite');
    expect(MOCKS.getGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-2.5-flash-lite' });
  });

  it('passes temperature as generation config', () => {
    new GeminiProvider({ apiKey: 'test-key', model: 'gemini-custom', temperature: 0.3 });

    expect(MOCKS.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-custom',
      generationConfig: { temperature: 0.3 },
    });
  });

  it('returns text and usage', async () => {
    MOCKS.generateContent.mockResolvedValue(
      geminiResult('{"questions": []}', { promptTokenCount: 30, candidatesTokenCount: 20 })
    );

    const provider = new GeminiProvider({ apiKey: 'test-key' });
    const controller = new AbortController();
    const result = await provider.generateText('Quiz me', { signal: controller.signal });

    expect(result).toEqual({ data: '{"questions": []}', usage: { inputTokens: 30, outputTokens: 20 } });
    expect(MOCKS.generateContent).toHaveBeenCalledWith('Quiz me', { signal: controller.signal });
  });

  it('omits usage when metadata is missing', async () => {
    MOCKS.generateContent.mockResolvedValue(geminiResult('ok'));

    const provider = new GeminiProvider({ apiKey: 'test-key' });
    const result = await provider.generateText('Quiz me');

    expect(result.usage).toBeUndefined();
    expect(MOCKS.generateContent).toHaveBeenCalledWith('Quiz me', {});
  });

  it('keeps the HTTP status of fetch errors', async () => {
    MOCKS.generateContent.mockRejectedValue(
      new MOCKS.GoogleGenerativeAIFetchError('Resource has been exhausted', 429)
    );

    const provider = new GeminiProvider({ apiKey: 'test-key' });
    const error: unknown = await provider.generateText('Quiz me').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'Gemini API error (429): Resource has been exhausted',
      provider: 'gemini',
      status: 429,
    });
  });

  it('wraps other failures without a status', async () => {
    MOCKS.generateContent.mockRejectedValue(new Error('fetch failed'));

    const provider = new GeminiProvider({ apiKey: 'test-key' });

    await expect(provider.generateText('Quiz me')).rejects.toMatchObject({
      message: 'Gemini API call failed: fetch failed',
      status: undefined,
    });
  });
});
