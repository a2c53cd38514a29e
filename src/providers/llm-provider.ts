import type { TokenUsage } from '../types/token-usage';

export interface LLMResult<T> {
  data: T;
  usage?: TokenUsage | undefined;
}

export interface GenerateOptions {
  signal?: AbortSignal | undefined;
}

export interface LLMProvider {
  readonly name: string;
  readonly modelId: string;
  generateText(prompt: string, options?: GenerateOptions): Promise<LLMResult<string>>;
}
