#!/usr/bin/env node
import { program } from 'commander';
import { handleUnknownError } from './errors/index';
import { loadDotEnv } from './boundaries/dotenv-loader';
import { registerCommands } from './cli/commands';
import { OutputFormat } from './cli/types';

loadDotEnv();

program
  .name('quizforge')
  .description('Chunk course material and generate quizzes and evaluations with an LLM')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--show-prompt', 'Print the full prompt sent to the model (with --verbose)')
  .option('--output <format>', `Output format: ${Object.values(OutputFormat).join(' or ')}`, OutputFormat.Line);

registerCommands(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
