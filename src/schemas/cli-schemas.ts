import { z } from 'zod';
import { OutputFormat } from '../cli/types';
import { Difficulty } from '../generation/types';

// Global options shared by every command
export const GLOBAL_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  showPrompt: z.boolean().default(false),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
});

const TIMEOUT_SCHEMA = z.coerce.number().int().positive().optional();

export const INDEX_OPTIONS_SCHEMA = z.object({
  id: z.string().trim().min(1).optional(),
});

export const SEGMENTS_OPTIONS_SCHEMA = z.object({
  keyword: z.string().min(1).optional(),
  sample: z.coerce.number().int().min(1).optional(),
});

export const QUIZ_OPTIONS_SCHEMA = z.object({
  count: z.coerce.number().int().min(1).default(5),
  difficulty: z
    .preprocess((v) => (typeof v === 'string' ? v.toUpperCase() : v), z.nativeEnum(Difficulty))
    .default(Difficulty.MEDIUM),
  title: z.string().optional(),
  sample: z.boolean().default(false),
  timeout: TIMEOUT_SCHEMA,
});

export const EVALUATE_OPTIONS_SCHEMA = z
  .object({
    score: z.coerce.number().min(0).max(100),
    correct: z.coerce.number().int().min(0),
    total: z.coerce.number().int().min(1),
    weak: z.array(z.string()).default([]),
    timeout: TIMEOUT_SCHEMA,
  })
  .refine((o) => o.correct <= o.total, { message: 'correct must not exceed total', path: ['correct'] });

// Inferred types
export type GlobalOptions = z.infer<typeof GLOBAL_OPTIONS_SCHEMA>;
export type IndexOptions = z.infer<typeof INDEX_OPTIONS_SCHEMA>;
export type SegmentsOptions = z.infer<typeof SEGMENTS_OPTIONS_SCHEMA>;
export type QuizOptions = z.infer<typeof QUIZ_OPTIONS_SCHEMA>;
export type EvaluateOptions = z.infer<typeof EVALUATE_OPTIONS_SCHEMA>;
