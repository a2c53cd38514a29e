import type { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import {
  parseEvaluateOptions,
  parseGlobalOptions,
  parseIndexOptions,
  parseQuizOptions,
  parseSegmentsOptions,
} from '../boundaries/cli-parser';
import { ALLOWED_EXTS } from '../config/constants';
import { ConfigError, handleUnknownError, isGenerationCancelled } from '../errors/index';
import { error, log } from '../output/logger';
import { printEvaluation, printJson, printQuiz, printSegments } from '../output/reporter';
import { sampleEvenly } from '../retrieval/retriever';
import { createRuntime, type Runtime } from './runtime';
import { OutputFormat } from './types';
import type { GlobalOptions } from '../schemas/cli-schemas';

function fail(e: unknown, context: string): never {
  if (isGenerationCancelled(e)) {
    error(`Cancelled: ${e.message}`);
    process.exit(2);
  }
  const err = handleUnknownError(e, context);
  error(`Error: ${err.message}`);
  process.exit(1);
}

function setup(program: Command): { globals: GlobalOptions; runtime: Runtime } {
  try {
    const globals = parseGlobalOptions(program.opts());
    return { globals, runtime: createRuntime(globals) };
  } catch (e: unknown) {
    fail(e, 'Initializing');
  }
}

function timeoutSignal(timeoutMs: number | undefined): AbortSignal | undefined {
  return timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined;
}

/*
 * index <file>: chunk a document and replace its stored segments.
 */
export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Split a text or markdown document into segments and store them')
    .argument('<file>', 'document to index')
    .option('--id <documentId>', 'document id (defaults to the file name without extension)')
    .action(async (file: string, rawOptions: unknown) => {
      const { globals, runtime } = setup(program);
      try {
        const options = parseIndexOptions(rawOptions);
        const fullPath = path.resolve(process.cwd(), file);
        if (!existsSync(fullPath)) {
          throw new ConfigError(`File does not exist: ${file}`);
        }
        const ext = path.extname(fullPath).toLowerCase();
        if (!ALLOWED_EXTS.has(ext)) {
          throw new ConfigError(`Only .md, .txt, and .mdx files can be indexed. Got: ${file}`);
        }

        const documentId = options.id ?? path.basename(fullPath, ext);
        const segments = await runtime.retriever.indexDocument(documentId, readFileSync(fullPath, 'utf-8'));

        if (globals.output === OutputFormat.Json) {
          printJson({ documentId, segmentCount: segments.length });
        } else {
          log(`Stored in ${runtime.store.filePath}`);
        }
      } catch (e: unknown) {
        fail(e, 'Indexing document');
      }
    });
}

/*
 * segments <documentId>: show stored segments, optionally filtered or sampled.
 */
export function registerSegmentsCommand(program: Command): void {
  program
    .command('segments')
    .description('List the stored segments of a document')
    .argument('<documentId>', 'indexed document id')
    .option('--keyword <keyword>', 'only segments containing this text (case-insensitive)')
    .option('--sample <n>', 'evenly sample n segments')
    .action(async (documentId: string, rawOptions: unknown) => {
      const { globals, runtime } = setup(program);
      try {
        const options = parseSegmentsOptions(rawOptions);
        let segments = options.keyword
          ? await runtime.retriever.byKeyword(documentId, options.keyword)
          : await runtime.retriever.segments(documentId);
        if (options.sample !== undefined) {
          segments = sampleEvenly(segments, options.sample);
        }

        if (globals.output === OutputFormat.Json) {
          printJson(segments);
        } else {
          printSegments(segments);
        }
      } catch (e: unknown) {
        fail(e, 'Listing segments');
      }
    });
}

/*
 * quiz <documentId>: generate a multiple-choice quiz from an indexed document.
 */
export function registerQuizCommand(program: Command): void {
  program
    .command('quiz')
    .description('Generate a multiple-choice quiz from an indexed document')
    .argument('<documentId>', 'indexed document id')
    .option('-n, --count <count>', 'number of questions', '5')
    .option('-d, --difficulty <level>', 'EASY, MEDIUM, HARD or EXPERT', 'MEDIUM')
    .option('--title <title>', 'course title shown to the model (defaults to the document id)')
    .option('--sample', 'use evenly sampled segments instead of the full document')
    .option('--timeout <ms>', 'abort generation after this many milliseconds')
    .action(async (documentId: string, rawOptions: unknown) => {
      const { globals, runtime } = setup(program);
      try {
        const options = parseQuizOptions(rawOptions);
        if (!(await runtime.retriever.isIndexed(documentId))) {
          throw new ConfigError(`Document '${documentId}' is not indexed. Run 'quizforge index' first.`);
        }

        const context = options.sample
          ? await runtime.retriever.sampledContext(documentId, options.count)
          : await runtime.retriever.fullContext(documentId);

        const result = await runtime.orchestrator.generateQuiz(
          {
            context,
            questionCount: options.count,
            difficulty: options.difficulty,
            title: options.title ?? documentId,
          },
          { signal: timeoutSignal(options.timeout) }
        );

        if (globals.output === OutputFormat.Json) {
          printJson(result);
        } else {
          printQuiz(result);
        }
      } catch (e: unknown) {
        fail(e, 'Generating quiz');
      }
    });
}

/*
 * evaluate: turn quiz score statistics into feedback and a next difficulty.
 */
export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Evaluate quiz results and recommend the next difficulty')
    .requiredOption('--score <percentage>', 'score percentage (0-100)')
    .requiredOption('--correct <n>', 'number of correct answers')
    .requiredOption('--total <n>', 'number of questions')
    .option('--weak <topics...>', 'topics answered incorrectly')
    .option('--timeout <ms>', 'abort evaluation after this many milliseconds')
    .action(async (rawOptions: unknown) => {
      const { globals, runtime } = setup(program);
      try {
        const options = parseEvaluateOptions(rawOptions);
        const result = await runtime.orchestrator.evaluateResults(
          {
            scorePercentage: options.score,
            correctAnswers: options.correct,
            totalQuestions: options.total,
            weakTopics: options.weak,
          },
          { signal: timeoutSignal(options.timeout) }
        );

        if (globals.output === OutputFormat.Json) {
          printJson(result);
        } else {
          printEvaluation(result);
        }
      } catch (e: unknown) {
        fail(e, 'Evaluating results');
      }
    });
}

export function registerCommands(program: Command): void {
  registerIndexCommand(program);
  registerSegmentsCommand(program);
  registerQuizCommand(program);
  registerEvaluateCommand(program);
}
