import OpenAI from 'openai';
import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';
import { debugRequest } from './prompt-debug';
import { OPENAI_RESPONSE_SCHEMA, type OpenAIResponse } from '../schemas/provider-responses';
import { ProviderError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';

export interface OpenAIConfig {
  apiKey: string;
  model?: string | undefined;
  temperature?: number | undefined;
  showPrompt?: boolean | undefined;
}

export const OpenAIDefaultConfig = {
  model: 'gpt-4o-mini',
  temperature: 0.2,
};

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly modelId: string;
  private client: OpenAI;
  private temperature: number;
  private showPrompt: boolean;

  constructor(config: OpenAIConfig) {
    // Retries are owned by the generation orchestrator
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
    this.modelId = config.model ?? OpenAIDefaultConfig.model;
    this.temperature = config.temperature ?? OpenAIDefaultConfig.temperature;
    this.showPrompt = config.showPrompt ?? false;
  }

  /**
   * Validates OpenAI API response using schema validation
   */
  private validateResponse(response: unknown): OpenAIResponse {
    const result = OPENAI_RESPONSE_SCHEMA.safeParse(response);
    if (!result.success) {
      throw new ProviderError(`Invalid OpenAI API response structure: ${result.error.message}`, this.name);
    }
    return result.data;
  }

  async generateText(prompt: string, options: GenerateOptions = {}): Promise<LLMResult<string>> {
    debugRequest('OpenAI', { model: this.modelId, temperature: this.temperature }, prompt, this.showPrompt);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(
        {
          model: this.modelId,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.temperature,
        },
        options.signal ? { signal: options.signal } : {}
      );
    } catch (e: unknown) {
      // Handle specific OpenAI SDK errors - check more specific errors first
      if (e instanceof OpenAI.RateLimitError) {
        throw new ProviderError(`OpenAI rate limit exceeded: ${e.message}`, this.name, 429);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new ProviderError(`OpenAI authentication failed: ${e.message}`, this.name, 401);
      }
      if (e instanceof OpenAI.APIError) {
        throw new ProviderError(`OpenAI API error (${e.status ?? 'unknown'}): ${e.message}`, this.name, e.status);
      }
      const err = handleUnknownError(e, 'OpenAI API call');
      throw new ProviderError(`OpenAI API call failed: ${err.message}`, this.name);
    }

    const response = this.validateResponse(rawResponse);
    const firstChoice = response.choices[0];
    const text = firstChoice?.message.content?.trim();
    if (!text) {
      throw new ProviderError('Empty response from OpenAI API (no content).', this.name);
    }

    const usage = response.usage
      ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
      : undefined;
    debug('LLM response meta:', { usage, finish_reason: firstChoice?.finish_reason });

    return { data: text, usage };
  }
}
