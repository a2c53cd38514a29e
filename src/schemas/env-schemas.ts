import { z } from 'zod';
import { ProviderType } from '../providers/provider-type';
import { GeminiDefaultConfig } from '../providers/gemini-provider';
import { OpenAIDefaultConfig } from '../providers/openai-provider';
import { AnthropicDefaultConfig } from '../providers/anthropic-provider';
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_STORE_DIR,
} from '../config/constants';

// A blank key counts as "not configured"
const OPTIONAL_API_KEY = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

// Gemini configuration schema
const GEMINI_CONFIG_SCHEMA = z.object({
  GEMINI_API_KEY: OPTIONAL_API_KEY,
  GEMINI_MODEL: z.string().min(1).default(GeminiDefaultConfig.model),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

// OpenAI configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: OPTIONAL_API_KEY,
  OPENAI_MODEL: z.string().min(1).default(OpenAIDefaultConfig.model),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

// Anthropic configuration schema
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: OPTIONAL_API_KEY,
  ANTHROPIC_MODEL: z.string().min(1).default(AnthropicDefaultConfig.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(AnthropicDefaultConfig.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// Discriminated union based on provider type
export const PROVIDER_ENV_SCHEMA = z.discriminatedUnion('LLM_PROVIDER', [
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Gemini) }).merge(GEMINI_CONFIG_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Anthropic) }).merge(ANTHROPIC_CONFIG_SCHEMA),
]);

// Chunking, retry and storage tuning
export const GENERATION_ENV_SCHEMA = z.object({
  QUIZFORGE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  QUIZFORGE_BASE_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_BASE_DELAY_MS),
  QUIZFORGE_CHUNK_SIZE: z.coerce.number().int().min(1).default(DEFAULT_CHUNK_SIZE),
  QUIZFORGE_CHUNK_OVERLAP: z.coerce.number().int().min(0).default(DEFAULT_CHUNK_OVERLAP),
  QUIZFORGE_STORE_DIR: z.string().min(1).default(DEFAULT_STORE_DIR),
});

// Gemini is the default provider when LLM_PROVIDER is unset or blank
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data === 'object' && data !== null) {
      const provider: unknown = 'LLM_PROVIDER' in data ? data.LLM_PROVIDER : undefined;
      if (provider === undefined || provider === '') {
        return { ...data, LLM_PROVIDER: ProviderType.Gemini };
      }
    }
    return data;
  },
  z.intersection(GENERATION_ENV_SCHEMA, PROVIDER_ENV_SCHEMA)
);

// Inferred types
export type ProviderEnvConfig = z.infer<typeof PROVIDER_ENV_SCHEMA>;
export type GenerationEnvConfig = z.infer<typeof GENERATION_ENV_SCHEMA>;
export type EnvConfig = z.infer<typeof ENV_SCHEMA_WITH_DEFAULTS>;
