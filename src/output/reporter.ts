import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { Segment } from '../chunking/types';
import type { EvaluationResult, Question, QuizResult } from '../generation/types';
import type { TokenUsage } from '../types/token-usage';

const OPTION_LABELS = ['A', 'B', 'C', 'D'];
const LABEL_WIDTH = 16;

function provenance(modelIdentifier: string, generatedByModel: boolean): string {
  return generatedByModel ? chalk.green(modelIdentifier) : chalk.yellow(modelIdentifier);
}

/**
 * Pads a possibly colored label to a fixed visible width.
 */
export function padLabel(label: string, width: number = LABEL_WIDTH): string {
  const visible = stripAnsi(label).length;
  return label + ' '.repeat(Math.max(0, width - visible));
}

export function printRow(label: string, value: string): void {
  console.log(`  ${padLabel(chalk.dim(label))}${value}`);
}

function printQuestion(question: Question, index: number): void {
  console.log(chalk.bold(`${index + 1}. ${question.questionText}`));
  question.options.forEach((option, i) => {
    const label = OPTION_LABELS[i] ?? String(i + 1);
    const marker = i === question.correctOptionIndex ? chalk.green('✔') : ' ';
    console.log(`   ${marker} ${label}) ${option.text}`);
    if (option.explanation) {
      console.log(chalk.dim(`        ${option.explanation}`));
    }
  });
  if (question.explanation) {
    console.log(`   ${chalk.cyan('Why:')} ${question.explanation}`);
  }
  if (question.sourceContext) {
    console.log(`   ${chalk.cyan('Source:')} ${chalk.italic(question.sourceContext)}`);
  }
  console.log('');
}

export function printTokenUsage(usage: TokenUsage): void {
  printRow('Tokens', `${usage.inputTokens} in / ${usage.outputTokens} out`);
}

export function printQuiz(result: QuizResult): void {
  if (result.questions.length === 0) {
    console.log(chalk.yellow('No questions could be generated from an empty context.'));
  }
  result.questions.forEach(printQuestion);
  printRow('Model', provenance(result.modelIdentifier, result.generatedByModel));
  printRow('Attempts', String(result.attempts));
  if (result.usage) {
    printTokenUsage(result.usage);
  }
}

function printList(title: string, items: string[]): void {
  if (items.length === 0) return;
  console.log(chalk.bold(title));
  for (const item of items) {
    console.log(`  - ${item}`);
  }
}

export function printEvaluation(result: EvaluationResult): void {
  console.log(result.validated ? chalk.green.bold('PASSED') : chalk.red.bold('NOT PASSED'));
  console.log(result.feedback);
  console.log('');
  printList('Strengths', result.strengths);
  printList('Weaknesses', result.weaknesses);
  printList('Recommendations', result.recommendations);
  console.log('');
  printRow('Next difficulty', result.recommendedDifficulty);
  printRow('Model', provenance(result.modelIdentifier, result.generatedByModel));
  printRow('Attempts', String(result.attempts));
}

export function printSegments(segments: Segment[]): void {
  if (segments.length === 0) {
    console.log(chalk.yellow('No segments stored for this document.'));
    return;
  }
  for (const segment of segments) {
    console.log(
      chalk.cyan(`#${segment.sequenceIndex}`) +
        chalk.dim(` [${segment.startOffset}-${segment.endOffset}] ${segment.text.length} chars`)
    );
    console.log(segment.text);
    console.log('');
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
