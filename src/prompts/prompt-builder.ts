import type { EvaluationRequest, QuizRequest } from '../generation/types';
import { renderTemplate } from './template-renderer';
import { EVALUATION_PROMPT_TEMPLATE, QUIZ_PROMPT_TEMPLATE } from './templates';

export function buildQuizPrompt(request: QuizRequest): string {
  return renderTemplate(QUIZ_PROMPT_TEMPLATE, {
    title: request.title,
    difficulty: request.difficulty,
    questionCount: request.questionCount,
    context: request.context,
  });
}

export function buildEvaluationPrompt(request: EvaluationRequest): string {
  return renderTemplate(EVALUATION_PROMPT_TEMPLATE, {
    scorePercentage: request.scorePercentage.toFixed(1),
    correctAnswers: request.correctAnswers,
    totalQuestions: request.totalQuestions,
    weakTopics: request.weakTopics.length > 0 ? request.weakTopics : 'none',
  });
}
