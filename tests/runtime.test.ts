import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createRuntime } from '../src/cli/runtime';
import { OutputFormat } from '../src/cli/types';
import { Difficulty } from '../src/generation/types';
import { isSilentMode, isVerboseMode, setSilentMode, setVerboseMode } from '../src/output/logger';

describe('createRuntime', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(path.join(os.tmpdir(), 'quizforge-runtime-'));
  });

  afterEach(() => {
    setSilentMode(false);
    setVerboseMode(false);
    rmSync(testDir, { recursive: true, force: true });
  });

  it('silences logging for json output and honors verbose', () => {
    createRuntime({ verbose: true, showPrompt: false, output: OutputFormat.Json }, testDir, {});

    expect(isSilentMode()).toBe(true);
    expect(isVerboseMode()).toBe(true);
  });

  it('stores segments under the configured directory', () => {
    const runtime = createRuntime(
      { verbose: false, showPrompt: false, output: OutputFormat.Json },
      testDir,
      { QUIZFORGE_STORE_DIR: 'data' }
    );

    expect(runtime.store.filePath).toBe(path.join(testDir, 'data', 'segments.json'));
  });

  it('runs index-then-quiz in mock mode without an API key', async () => {
    const runtime = createRuntime(
      { verbose: false, showPrompt: false, output: OutputFormat.Json },
      testDir,
      { QUIZFORGE_CHUNK_SIZE: '40', QUIZFORGE_CHUNK_OVERLAP: '0' }
    );
    await runtime.retriever.indexDocument(
      'biology',
      'Cells are the unit of life. They divide.\n\nEnzymes speed up reactions.'
    );

    const result = await runtime.orchestrator.generateQuiz({
      context: await runtime.retriever.fullContext('biology'),
      questionCount: 3,
      difficulty: Difficulty.EASY,
      title: 'Biology',
    });

    expect(runtime.orchestrator.isModelAvailable()).toBe(false);
    expect(await runtime.store.countSegments('biology')).toBe(2);
    expect(result.modelIdentifier).toBe('mock');
    expect(result.questions.map((q) => q.options[0]?.text)).toEqual([
      'Correct: Cells are the unit of life',
      'Correct: Enzymes speed up reactions.',
      'Correct: Cells are the unit of life',
    ]);
  });
});
