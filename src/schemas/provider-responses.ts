import { z } from 'zod';

// OpenAI chat completion response (only the parts read back)
export const OPENAI_CHOICE_SCHEMA = z.object({
  message: z.object({
    content: z.string().nullable(),
  }),
  finish_reason: z.string().nullable(),
});

export const OPENAI_USAGE_SCHEMA = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

export const OPENAI_RESPONSE_SCHEMA = z.object({
  choices: z.array(OPENAI_CHOICE_SCHEMA).min(1),
  usage: OPENAI_USAGE_SCHEMA.nullish(),
});

// Anthropic message response; non-text blocks are kept but ignored
export const ANTHROPIC_CONTENT_BLOCK_SCHEMA = z.object({
  type: z.string(),
  text: z.string().optional(),
});

export const ANTHROPIC_USAGE_SCHEMA = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
});

export const ANTHROPIC_RESPONSE_SCHEMA = z.object({
  content: z.array(ANTHROPIC_CONTENT_BLOCK_SCHEMA),
  stop_reason: z.string().nullable(),
  usage: ANTHROPIC_USAGE_SCHEMA,
});

export type OpenAIResponse = z.infer<typeof OPENAI_RESPONSE_SCHEMA>;
export type AnthropicResponse = z.infer<typeof ANTHROPIC_RESPONSE_SCHEMA>;
export type AnthropicContentBlock = z.infer<typeof ANTHROPIC_CONTENT_BLOCK_SCHEMA>;
