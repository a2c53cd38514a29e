import { parseEnvironment } from '../boundaries/env-parser';
import type { EnvConfig } from '../schemas/env-schemas';
import { FileSegmentStore } from '../retrieval/file-segment-store';
import { SegmentRetriever } from '../retrieval/retriever';
import { ProviderHandle } from '../providers/provider-handle';
import { GenerationOrchestrator } from '../generation/orchestrator';
import { setSilentMode, setVerboseMode } from '../output/logger';
import { OutputFormat } from './types';
import type { GlobalOptions } from '../schemas/cli-schemas';

export interface Runtime {
  env: EnvConfig;
  store: FileSegmentStore;
  retriever: SegmentRetriever;
  orchestrator: GenerationOrchestrator;
}

/**
 * Wires the collaborators for one CLI invocation. The provider handle is built
 * here once and injected; the SDK client itself is only created on first use.
 */
export function createRuntime(
  options: GlobalOptions,
  cwd: string = process.cwd(),
  processEnv: NodeJS.ProcessEnv = process.env
): Runtime {
  setVerboseMode(options.verbose);
  setSilentMode(options.output === OutputFormat.Json);

  const env = parseEnvironment(processEnv);
  const store = new FileSegmentStore(cwd, env.QUIZFORGE_STORE_DIR);
  const retriever = new SegmentRetriever(store, {
    chunking: {
      targetSize: env.QUIZFORGE_CHUNK_SIZE,
      overlapWidth: env.QUIZFORGE_CHUNK_OVERLAP,
    },
  });
  const orchestrator = new GenerationOrchestrator({
    provider: ProviderHandle.fromEnvironment(env, { showPrompt: options.showPrompt }),
    maxAttempts: env.QUIZFORGE_MAX_ATTEMPTS,
    baseDelayMs: env.QUIZFORGE_BASE_DELAY_MS,
  });

  return { env, store, retriever, orchestrator };
}
