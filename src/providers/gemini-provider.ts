import { GoogleGenerativeAI, GoogleGenerativeAIFetchError, type GenerativeModel } from '@google/generative-ai';
import type { GenerateOptions, LLMProvider, LLMResult } from './llm-provider';
import { debugRequest } from './prompt-debug';
import { ProviderError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';

export interface GeminiConfig {
    apiKey: string;
    model?: string | undefined;
    temperature?: number | undefined;
    showPrompt?: boolean | undefined;
}

export const GeminiDefaultConfig = {
    // Flash-lite has the most generous free-tier rate limits
    model: 'gemini-2.5-flash-lite',
};

export class GeminiProvider implements LLMProvider {
    readonly name = 'gemini';
    readonly modelId: string;
    private model: GenerativeModel;
    private config: GeminiConfig;

    constructor(config: GeminiConfig) {
        this.config = config;
        this.modelId = config.model ?? GeminiDefaultConfig.model;
        this.model = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({
            model: this.modelId,
            ...(config.temperature !== undefined && { generationConfig: { temperature: config.temperature } }),
        });
    }

    async generateText(prompt: string, options: GenerateOptions = {}): Promise<LLMResult<string>> {
        debugRequest('Gemini', { model: this.modelId, temperature: this.config.temperature }, prompt, this.config.showPrompt);

        let text: string;
        let usage: LLMResult<string>['usage'];
        try {
            const result = await this.model.generateContent(
                prompt,
                options.signal ? { signal: options.signal } : {}
            );
            text = result.response.text();
            const meta = result.response.usageMetadata;
            usage = meta
                ? { inputTokens: meta.promptTokenCount, outputTokens: meta.candidatesTokenCount }
                : undefined;
        } catch (e: unknown) {
            if (e instanceof GoogleGenerativeAIFetchError) {
                throw new ProviderError(`Gemini API error (${e.status ?? 'unknown'}): ${e.message}`, this.name, e.status);
            }
            const err = handleUnknownError(e, 'Gemini API call');
            throw new ProviderError(`Gemini API call failed: ${err.message}`, this.name);
        }

        debug(`Received Gemini response (${text.length} chars)`, usage ?? {});
        return { data: text, usage };
    }
}
