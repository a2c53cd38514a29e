import { describe, it, expect } from 'vitest';
import { FailureKind, classifyRateLimitFailure } from '../src/generation/failure-classifier';
import { backoffDelay, defaultSleep } from '../src/generation/backoff';
import { ProviderError } from '../src/errors/index';

describe('classifyRateLimitFailure', () => {
  it('retries a provider error with status 429', () => {
    expect(classifyRateLimitFailure(new ProviderError('Too many requests', 'gemini', 429))).toBe(
      FailureKind.Retryable
    );
  });

  it('retries any error object carrying status 429', () => {
    const error = Object.assign(new Error('Slow down'), { status: 429 });
    expect(classifyRateLimitFailure(error)).toBe(FailureKind.Retryable);
  });

  it.each([
    'HTTP 429 returned',
    'Rate limit reached for requests',
    'You exceeded your current QUOTA',
    'RESOURCE_EXHAUSTED',
  ])('retries on message "%s"', (message) => {
    expect(classifyRateLimitFailure(new Error(message))).toBe(FailureKind.Retryable);
  });

  it('treats other failures as fatal', () => {
    expect(classifyRateLimitFailure(new ProviderError('Invalid API key', 'openai', 401))).toBe(FailureKind.Fatal);
    expect(classifyRateLimitFailure(new Error('socket hang up'))).toBe(FailureKind.Fatal);
  });

  it('does not retry a Gemini error whose request URL contains "generate"', () => {
    const error = new ProviderError(
      'Gemini API error (400): [GoogleGenerativeAI Error]: Error fetching from ' +
        'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash-lite:generateContent: ' +
        '[400 Bad Request] API key not valid',
      'gemini',
      400
    );
    expect(classifyRateLimitFailure(error)).toBe(FailureKind.Fatal);
  });

  it('decides on a known status alone', () => {
    expect(classifyRateLimitFailure(new ProviderError('Rate limit exceeded', 'openai', 500))).toBe(FailureKind.Fatal);
    expect(classifyRateLimitFailure(new ProviderError('Forbidden', 'gemini', 403))).toBe(FailureKind.Fatal);
    expect(
      classifyRateLimitFailure(
        new ProviderError('Gemini API error (429): [429 Too Many Requests] Resource has been exhausted', 'gemini', 429)
      )
    ).toBe(FailureKind.Retryable);
  });

  it.each(['Failed to generateContent', 'Not accurate enough', 'Could not separate options'])(
    'does not treat "%s" as a rate limit',
    (message) => {
      expect(classifyRateLimitFailure(new Error(message))).toBe(FailureKind.Fatal);
    }
  );

  it('classifies thrown strings by their text', () => {
    expect(classifyRateLimitFailure('quota exceeded')).toBe(FailureKind.Retryable);
    expect(classifyRateLimitFailure(42)).toBe(FailureKind.Fatal);
  });
});

describe('backoffDelay', () => {
  it('doubles the base delay after each failed attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(5000, attempt))).toEqual([5000, 10000, 20000, 40000]);
  });

  it('stays at zero for a zero base delay', () => {
    expect(backoffDelay(0, 3)).toBe(0);
  });
});

describe('defaultSleep', () => {
  it('resolves after the delay', async () => {
    await expect(defaultSleep(1)).resolves.toBeUndefined();
  });

  it('rejects when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(defaultSleep(10_000, controller.signal)).rejects.toThrow();
  });
});
