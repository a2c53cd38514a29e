import Anthropic from '@anthropic-ai/sdk';
import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';
import { debugRequest } from './prompt-debug';
import {
  ANTHROPIC_RESPONSE_SCHEMA,
  type AnthropicContentBlock,
  type AnthropicResponse,
} from '../schemas/provider-responses';
import { ProviderError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';

export interface AnthropicConfig {
  apiKey: string;
  model?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  showPrompt?: boolean | undefined;
}

export const AnthropicDefaultConfig = {
  model: 'claude-3-5-haiku-latest',
  maxTokens: 4096,
  temperature: 0.2,
};

function textOf(blocks: AnthropicContentBlock[]): string {
  return blocks
    .filter((block) => block.type === 'text')
    .map((block) => block.text ?? '')
    .join('');
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly modelId: string;
  private client: Anthropic;
  private maxTokens: number;
  private temperature: number;
  private showPrompt: boolean;

  constructor(config: AnthropicConfig) {
    // Retries are owned by the generation orchestrator
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
    this.modelId = config.model ?? AnthropicDefaultConfig.model;
    this.maxTokens = config.maxTokens ?? AnthropicDefaultConfig.maxTokens;
    this.temperature = config.temperature ?? AnthropicDefaultConfig.temperature;
    this.showPrompt = config.showPrompt ?? false;
  }

  /**
   * Validates Anthropic API response using schema validation
   */
  private validateResponse(response: unknown): AnthropicResponse {
    const result = ANTHROPIC_RESPONSE_SCHEMA.safeParse(response);
    if (!result.success) {
      throw new ProviderError(`Invalid Anthropic API response structure: ${result.error.message}`, this.name);
    }
    return result.data;
  }

  async generateText(prompt: string, options: GenerateOptions = {}): Promise<LLMResult<string>> {
    debugRequest(
      'Anthropic',
      { model: this.modelId, maxTokens: this.maxTokens, temperature: this.temperature },
      prompt,
      this.showPrompt
    );

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(
        {
          model: this.modelId,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          messages: [{ role: 'user', content: prompt }],
        },
        options.signal ? { signal: options.signal } : {}
      );
    } catch (e: unknown) {
      // Handle specific Anthropic SDK errors - subclasses before APIError
      if (e instanceof Anthropic.RateLimitError) {
        throw new ProviderError(`Anthropic rate limit exceeded: ${e.message}`, this.name, 429);
      }
      if (e instanceof Anthropic.AuthenticationError) {
        throw new ProviderError(`Anthropic authentication failed: ${e.message}`, this.name, 401);
      }
      if (e instanceof Anthropic.APIError) {
        throw new ProviderError(`Anthropic API error (${e.status ?? 'unknown'}): ${e.message}`, this.name, e.status);
      }
      const err = handleUnknownError(e, 'Anthropic API call');
      throw new ProviderError(`Anthropic API call failed: ${err.message}`, this.name);
    }

    const response = this.validateResponse(rawResponse);
    const text = textOf(response.content).trim();
    if (!text) {
      throw new ProviderError('Empty response from Anthropic API (no text content).', this.name);
    }

    const usage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
    debug('LLM response meta:', { usage, stop_reason: response.stop_reason });

    return { data: text, usage };
  }
}
