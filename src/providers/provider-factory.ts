import type { LLMProvider } from './llm-provider';
import { GeminiProvider, type GeminiConfig } from './gemini-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { ProviderType } from './provider-type';
import type { ProviderEnvConfig } from '../schemas/env-schemas';
import { ConfigError } from '../errors/index';

export interface ProviderOptions {
  showPrompt?: boolean;
}

function requireKey(key: string | undefined, variable: string): string {
  if (!key) {
    throw new ConfigError(`${variable} is not set`);
  }
  return key;
}

/**
 * Creates the appropriate LLM provider based on environment configuration
 * @param envConfig - Validated environment configuration
 * @param options - Display options
 * @throws ConfigError when the selected provider has no API key
 */
export function createProvider(envConfig: ProviderEnvConfig, options: ProviderOptions = {}): LLMProvider {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.Gemini: {
      const geminiConfig: GeminiConfig = {
        apiKey: requireKey(envConfig.GEMINI_API_KEY, 'GEMINI_API_KEY'),
        model: envConfig.GEMINI_MODEL,
        temperature: envConfig.GEMINI_TEMPERATURE,
        showPrompt: options.showPrompt,
      };
      return new GeminiProvider(geminiConfig);
    }

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: requireKey(envConfig.OPENAI_API_KEY, 'OPENAI_API_KEY'),
        model: envConfig.OPENAI_MODEL,
        temperature: envConfig.OPENAI_TEMPERATURE,
        showPrompt: options.showPrompt,
      };
      return new OpenAIProvider(openaiConfig);
    }

    case ProviderType.Anthropic: {
      const anthropicConfig: AnthropicConfig = {
        apiKey: requireKey(envConfig.ANTHROPIC_API_KEY, 'ANTHROPIC_API_KEY'),
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        temperature: envConfig.ANTHROPIC_TEMPERATURE,
        showPrompt: options.showPrompt,
      };
      return new AnthropicProvider(anthropicConfig);
    }
  }
}
