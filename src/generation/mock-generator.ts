import { splitParagraphs, truncateWithEllipsis } from '../chunking/utils';
import { MOCK_MODEL_ID, PASSING_SCORE_PERCENTAGE } from '../config/constants';
import {
  Difficulty,
  type EvaluationResult,
  type Question,
  type QuizOption,
  type QuizResult,
} from './types';

const SOURCE_CONTEXT_LENGTH = 100;
const CORRECT_OPTION_LENGTH = 50;
const DISTRACTOR_COUNT = 3;

function createMockQuestion(paragraph: string, index: number): Question {
  const mainSentence = paragraph.split('. ')[0] ?? paragraph;

  const options: QuizOption[] = [
    {
      text: `Correct: ${truncateWithEllipsis(mainSentence, CORRECT_OPTION_LENGTH)}`,
      explanation: 'Correct answer from the course.',
    },
  ];
  for (let i = 1; i <= DISTRACTOR_COUNT; i++) {
    options.push({
      text: `Distractor option ${i}`,
      explanation: 'Incorrect - not from course content.',
    });
  }

  return {
    questionText: `Question ${index + 1}: What is the key concept in this section?`,
    options,
    correctOptionIndex: 0,
    explanation: 'This reflects the course content.',
    sourceContext: truncateWithEllipsis(mainSentence, SOURCE_CONTEXT_LENGTH),
  };
}

/**
 * Builds questions from the context alone: question i uses paragraph i mod paragraphCount.
 * A blank context has no paragraphs and yields no questions.
 */
export function generateMockQuestions(context: string, questionCount: number): Question[] {
  const paragraphs = splitParagraphs(context);
  if (paragraphs.length === 0) {
    return [];
  }

  const questions: Question[] = [];
  for (let i = 0; i < questionCount; i++) {
    const paragraph = paragraphs[i % paragraphs.length] ?? '';
    questions.push(createMockQuestion(paragraph.trim(), i));
  }
  return questions;
}

export function generateMockQuiz(
  context: string,
  questionCount: number,
  modelIdentifier: string = MOCK_MODEL_ID
): QuizResult {
  return {
    questions: generateMockQuestions(context, questionCount),
    modelIdentifier,
    generatedByModel: false,
    attempts: 0,
  };
}

export function generateMockEvaluation(
  scorePercentage: number,
  modelIdentifier: string = MOCK_MODEL_ID
): EvaluationResult {
  const provenance = { modelIdentifier, generatedByModel: false, attempts: 0 };

  if (scorePercentage >= PASSING_SCORE_PERCENTAGE) {
    return {
      feedback: 'Good job! You passed the quiz.',
      strengths: ['Good understanding'],
      weaknesses: [],
      recommendations: ['Try a harder quiz'],
      recommendedDifficulty: Difficulty.HARD,
      validated: true,
      ...provenance,
    };
  }

  return {
    feedback: 'Keep studying! Review the material.',
    strengths: ['Effort shown'],
    weaknesses: ['Needs more review'],
    recommendations: ['Re-read course content'],
    recommendedDifficulty: Difficulty.EASY,
    validated: false,
    ...provenance,
  };
}
