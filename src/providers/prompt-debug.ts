import { debug } from '../output/logger';

const PREVIEW_LENGTH = 500;

/**
 * Verbose-mode request logging shared by the providers.
 * Prints the full prompt with showPrompt, a 500-char preview otherwise.
 */
export function debugRequest(
  provider: string,
  meta: Record<string, unknown>,
  prompt: string,
  showPrompt = false
): void {
  debug(`Sending request to ${provider}:`, meta);
  if (showPrompt) {
    debug('Prompt (full):');
    debug(prompt);
    return;
  }
  debug(`Prompt preview (first ${PREVIEW_LENGTH} chars):`);
  debug(prompt.slice(0, PREVIEW_LENGTH) + (prompt.length > PREVIEW_LENGTH ? '\n... [truncated]' : ''));
}
