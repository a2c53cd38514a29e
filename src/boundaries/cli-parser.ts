import { z } from 'zod';
import {
  EVALUATE_OPTIONS_SCHEMA,
  GLOBAL_OPTIONS_SCHEMA,
  INDEX_OPTIONS_SCHEMA,
  QUIZ_OPTIONS_SCHEMA,
  SEGMENTS_OPTIONS_SCHEMA,
  type EvaluateOptions,
  type GlobalOptions,
  type IndexOptions,
  type QuizOptions,
  type SegmentsOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.infer<T> {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const details = e.issues.map((issue) => `${issue.path.join('.') || label}: ${issue.message}`).join(', ');
      throw new ValidationError(`Invalid ${label} options: ${details}`);
    }
    const err = handleUnknownError(e, `${label} option parsing`);
    throw new ValidationError(`${label} option parsing failed: ${err.message}`);
  }
}

export function parseGlobalOptions(raw: unknown): GlobalOptions {
  return parseWith(GLOBAL_OPTIONS_SCHEMA, raw, 'global');
}

export function parseIndexOptions(raw: unknown): IndexOptions {
  return parseWith(INDEX_OPTIONS_SCHEMA, raw, 'index');
}

export function parseSegmentsOptions(raw: unknown): SegmentsOptions {
  return parseWith(SEGMENTS_OPTIONS_SCHEMA, raw, 'segments');
}

export function parseQuizOptions(raw: unknown): QuizOptions {
  return parseWith(QUIZ_OPTIONS_SCHEMA, raw, 'quiz');
}

export function parseEvaluateOptions(raw: unknown): EvaluateOptions {
  return parseWith(EVALUATE_OPTIONS_SCHEMA, raw, 'evaluate');
}
