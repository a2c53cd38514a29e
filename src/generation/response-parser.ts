import {
  EVALUATION_PAYLOAD_SCHEMA,
  OPTION_PAYLOAD_SCHEMA,
  QUESTION_PAYLOAD_SCHEMA,
  QUIZ_PAYLOAD_SCHEMA,
} from '../schemas/payload-schemas';
import { PASSING_SCORE_PERCENTAGE } from '../config/constants';
import { debug } from '../output/logger';
import { handleUnknownError } from '../errors/index';
import { OPTIONS_PER_QUESTION, type Difficulty, type Question, type QuizOption } from './types';

const CODE_FENCE = /```(?:json)?\s*/g;

export interface ParsedEvaluation {
  feedback: string;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  recommendedDifficulty: Difficulty;
  validated: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the JSON object embedded in free-form model output: fences are stripped,
 * then everything from the first '{' to the last '}' is taken.
 * Returns undefined when there is no such span or it does not decode to an object.
 */
export function extractPayload(rawText: string): Record<string, unknown> | undefined {
  const cleaned = rawText.replace(CODE_FENCE, '');
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return undefined;
  }

  try {
    const decoded: unknown = JSON.parse(cleaned.substring(start, end + 1));
    return isRecord(decoded) ? decoded : undefined;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Decoding model payload');
    debug(`Could not decode model payload: ${err.message}`);
    return undefined;
  }
}

function toOption(raw: unknown): QuizOption | undefined {
  const parsed = OPTION_PAYLOAD_SCHEMA.safeParse(raw);
  if (!parsed.success) return undefined;
  return { text: parsed.data.text, explanation: parsed.data.explanation };
}

/**
 * Maps one decoded question, or returns undefined when it cannot satisfy the
 * question shape (blank text, not exactly 4 options, index out of range).
 */
function toQuestion(raw: unknown): Question | undefined {
  const parsed = QUESTION_PAYLOAD_SCHEMA.safeParse(raw);
  if (!parsed.success) return undefined;

  const q = parsed.data;
  const options = q.options
    .map(toOption)
    .filter((o): o is QuizOption => o !== undefined);

  if (!q.question_text.trim()) return undefined;
  if (options.length !== OPTIONS_PER_QUESTION) return undefined;
  if (q.correct_option_index < 0 || q.correct_option_index >= OPTIONS_PER_QUESTION) return undefined;

  return {
    questionText: q.question_text,
    options,
    correctOptionIndex: q.correct_option_index,
    explanation: q.explanation,
    sourceContext: q.source_context,
  };
}

export function parseQuizPayload(payload: Record<string, unknown>): Question[] {
  const parsed = QUIZ_PAYLOAD_SCHEMA.parse(payload);
  const questions = parsed.questions
    .map(toQuestion)
    .filter((q): q is Question => q !== undefined);

  const dropped = parsed.questions.length - questions.length;
  if (dropped > 0) {
    debug(`Dropped ${dropped} malformed question(s) from model payload`);
  }
  return questions;
}

/**
 * Questions decoded from a model response. An empty list means the response
 * could not be used.
 */
export function parseQuizResponse(rawText: string): Question[] {
  const payload = extractPayload(rawText);
  return payload ? parseQuizPayload(payload) : [];
}

export function parseEvaluationPayload(
  payload: Record<string, unknown>,
  scorePercentage: number
): ParsedEvaluation {
  const parsed = EVALUATION_PAYLOAD_SCHEMA.parse(payload);
  return {
    feedback: parsed.feedback,
    strengths: parsed.strengths,
    weaknesses: parsed.weaknesses,
    recommendations: parsed.recommendations,
    recommendedDifficulty: parsed.recommended_difficulty,
    validated: parsed.course_validated ?? scorePercentage >= PASSING_SCORE_PERCENTAGE,
  };
}

export function parseEvaluationResponse(
  rawText: string,
  scorePercentage: number
): ParsedEvaluation | undefined {
  const payload = extractPayload(rawText);
  return payload ? parseEvaluationPayload(payload, scorePercentage) : undefined;
}
