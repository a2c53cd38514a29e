import { z } from 'zod';
import { Difficulty } from '../generation/types';

/*
 * Wire shape of model responses. Every field is lenient: a missing or mistyped
 * value falls back to its default instead of failing the whole payload.
 * Field names are the snake_case names the prompt templates ask for.
 */

export const OPTION_PAYLOAD_SCHEMA = z.object({
  text: z.string().catch(''),
  explanation: z.string().catch(''),
});

export const QUESTION_PAYLOAD_SCHEMA = z.object({
  question_text: z.string().catch(''),
  options: z.array(z.unknown()).catch([]),
  correct_option_index: z.number().int().catch(0),
  explanation: z.string().catch(''),
  source_context: z.string().catch(''),
});

export const QUIZ_PAYLOAD_SCHEMA = z.object({
  questions: z.array(z.unknown()).catch([]),
});

const STRING_LIST_SCHEMA = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === 'string'));

export const EVALUATION_PAYLOAD_SCHEMA = z.object({
  feedback: z.string().catch('Good effort!'),
  strengths: STRING_LIST_SCHEMA,
  weaknesses: STRING_LIST_SCHEMA,
  recommendations: STRING_LIST_SCHEMA,
  recommended_difficulty: z
    .preprocess((v) => (typeof v === 'string' ? v.trim().toUpperCase() : v), z.nativeEnum(Difficulty))
    .catch(Difficulty.MEDIUM),
  course_validated: z.boolean().optional().catch(undefined),
});
