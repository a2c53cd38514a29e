import type { TokenUsage } from '../types/token-usage';

/**
 * Ordered difficulty scale. Enum order is significant: EASY < MEDIUM < HARD < EXPERT.
 */
export enum Difficulty {
  EASY = 'EASY',
  MEDIUM = 'MEDIUM',
  HARD = 'HARD',
  EXPERT = 'EXPERT',
}

export const OPTIONS_PER_QUESTION = 4;

export interface QuizOption {
  text: string;
  explanation: string;
}

export interface Question {
  questionText: string;
  options: QuizOption[];
  correctOptionIndex: number;
  explanation: string;
  sourceContext: string;
}

export interface QuizRequest {
  context: string;
  questionCount: number;
  difficulty: Difficulty;
  title: string;
}

export interface QuizResult {
  questions: Question[];
  modelIdentifier: string;
  generatedByModel: boolean;
  attempts: number;
  usage?: TokenUsage | undefined;
}

export interface EvaluationRequest {
  scorePercentage: number;
  correctAnswers: number;
  totalQuestions: number;
  weakTopics: string[];
}

export interface EvaluationResult {
  feedback: string;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  recommendedDifficulty: Difficulty;
  validated: boolean;
  modelIdentifier: string;
  generatedByModel: boolean;
  attempts: number;
}

export interface GenerationCallOptions {
  signal?: AbortSignal | undefined;
}
