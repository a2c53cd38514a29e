import type { LLMProvider } from '../providers/llm-provider';
import type { ProviderHandle } from '../providers/provider-handle';
import { buildEvaluationPrompt, buildQuizPrompt } from '../prompts/prompt-builder';
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  MOCK_MODEL_ID,
  RATE_LIMITED_MOCK_MODEL_ID,
} from '../config/constants';
import { GenerationCancelledError, handleUnknownError } from '../errors/index';
import { debug, error, log, warn } from '../output/logger';
import { addUsage, type TokenUsage } from '../types/token-usage';
import { backoffDelay, defaultSleep, type Sleep } from './backoff';
import { FailureKind, classifyRateLimitFailure, type FailureClassifier } from './failure-classifier';
import { generateMockEvaluation, generateMockQuiz } from './mock-generator';
import { parseEvaluationResponse, parseQuizResponse } from './response-parser';
import type {
  EvaluationRequest,
  EvaluationResult,
  GenerationCallOptions,
  Question,
  QuizRequest,
  QuizResult,
} from './types';

export interface OrchestratorOptions {
  provider: ProviderHandle;
  maxAttempts?: number | undefined;
  baseDelayMs?: number | undefined;
  sleep?: Sleep | undefined;
  classifyFailure?: FailureClassifier | undefined;
}

export enum FallbackCause {
  RateLimited = 'rate-limited',
  Fatal = 'fatal',
  Unparseable = 'unparseable',
}

type AttemptOutcome<T> =
  | { status: 'success'; value: T; modelId: string; attempts: number; usage: TokenUsage | undefined }
  | { status: 'failed'; cause: FallbackCause; attempts: number };

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new GenerationCancelledError('Generation cancelled', signal.reason);
  }
}

function fallbackModelId(cause: FallbackCause): string {
  return cause === FallbackCause.RateLimited ? RATE_LIMITED_MOCK_MODEL_ID : MOCK_MODEL_ID;
}

/**
 * Drives prompt building, the model call, response parsing and local fallback.
 *
 * Attempt loop: each attempt calls the model once. A retryable failure waits
 * baseDelay * 2^(attempt-1) and tries again while attempts remain; a fatal failure
 * or an unusable response ends the loop at once. Any loop that ends without a
 * parsed result falls back to the mock generator.
 *
 * Only GenerationCancelledError escapes: it is raised when the caller's signal
 * aborts before a call, during a call, or during a backoff wait.
 */
export class GenerationOrchestrator {
  private readonly provider: ProviderHandle;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: Sleep;
  private readonly classifyFailure: FailureClassifier;

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.classifyFailure = options.classifyFailure ?? classifyRateLimitFailure;
  }

  isModelAvailable(): boolean {
    return this.provider.isConfigured();
  }

  async generateQuiz(request: QuizRequest, options: GenerationCallOptions = {}): Promise<QuizResult> {
    const { signal } = options;
    throwIfCancelled(signal);
    debug(`Starting quiz generation - provider configured: ${this.isModelAvailable()}`);

    if (!this.isModelAvailable()) {
      warn('No LLM provider configured - using mock mode');
      return generateMockQuiz(request.context, request.questionCount);
    }

    const outcome = await this.runWithRetry<Question[]>(
      buildQuizPrompt(request),
      (text) => {
        const questions = parseQuizResponse(text);
        return questions.length > 0 ? questions : undefined;
      },
      signal
    );

    if (outcome.status === 'success') {
      log(`Generated quiz with ${outcome.value.length} question(s) using ${outcome.modelId}`);
      return {
        questions: outcome.value,
        modelIdentifier: outcome.modelId,
        generatedByModel: true,
        attempts: outcome.attempts,
        usage: outcome.usage,
      };
    }

    warn(`Quiz generation fell back to mock mode (${outcome.cause})`);
    return {
      ...generateMockQuiz(request.context, request.questionCount, fallbackModelId(outcome.cause)),
      attempts: outcome.attempts,
    };
  }

  async evaluateResults(
    request: EvaluationRequest,
    options: GenerationCallOptions = {}
  ): Promise<EvaluationResult> {
    const { signal } = options;
    throwIfCancelled(signal);

    if (!this.isModelAvailable()) {
      warn('No LLM provider configured - using mock evaluation');
      return generateMockEvaluation(request.scorePercentage);
    }

    const outcome = await this.runWithRetry(
      buildEvaluationPrompt(request),
      (text) => parseEvaluationResponse(text, request.scorePercentage),
      signal
    );

    if (outcome.status === 'success') {
      return {
        ...outcome.value,
        modelIdentifier: outcome.modelId,
        generatedByModel: true,
        attempts: outcome.attempts,
      };
    }

    warn(`Evaluation fell back to mock mode (${outcome.cause})`);
    return {
      ...generateMockEvaluation(request.scorePercentage, fallbackModelId(outcome.cause)),
      attempts: outcome.attempts,
    };
  }

  private resolveProvider(): LLMProvider | undefined {
    try {
      return this.provider.get();
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Initializing LLM provider');
      error(`Failed to initialize LLM provider: ${err.message}`);
      return undefined;
    }
  }

  private async runWithRetry<T>(
    prompt: string,
    parse: (text: string) => T | undefined,
    signal: AbortSignal | undefined
  ): Promise<AttemptOutcome<T>> {
    const provider = this.resolveProvider();
    if (!provider) {
      return { status: 'failed', cause: FallbackCause.Fatal, attempts: 0 };
    }

    let usage: TokenUsage | undefined;
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      attempt++;
      throwIfCancelled(signal);
      debug(`Calling ${provider.name} (${provider.modelId}) - attempt ${attempt}/${this.maxAttempts}`);

      let text: string;
      try {
        const result = await provider.generateText(prompt, { signal });
        text = result.data;
        usage = addUsage(usage, result.usage);
      } catch (e: unknown) {
        throwIfCancelled(signal);
        const err = handleUnknownError(e, 'LLM call');
        warn(`Attempt ${attempt}/${this.maxAttempts} failed: ${err.message}`);

        if (this.classifyFailure(e) === FailureKind.Fatal) {
          error('Non-recoverable error calling LLM provider:', err.message);
          return { status: 'failed', cause: FallbackCause.Fatal, attempts: attempt };
        }
        if (attempt >= this.maxAttempts) {
          break;
        }

        const delayMs = backoffDelay(this.baseDelayMs, attempt);
        log(`Rate limited - waiting ${delayMs / 1000} seconds before retry...`);
        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError: unknown) {
          throw new GenerationCancelledError('Generation cancelled during backoff', signal?.reason ?? sleepError);
        }
        continue;
      }

      debug(`Received response (${text.length} chars)`);
      const value = parse(text);
      if (value === undefined) {
        warn('Could not parse a usable payload from the model response');
        return { status: 'failed', cause: FallbackCause.Unparseable, attempts: attempt };
      }
      return { status: 'success', value, modelId: provider.modelId, attempts: attempt, usage };
    }

    warn('All retries exhausted');
    return { status: 'failed', cause: FallbackCause.RateLimited, attempts: attempt };
  }
}
