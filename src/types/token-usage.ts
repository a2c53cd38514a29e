export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

/**
 * Sums usage across attempts. Returns undefined when no attempt reported usage.
 */
export function addUsage(a: TokenUsage | undefined, b: TokenUsage | undefined): TokenUsage | undefined {
    if (!a) return b;
    if (!b) return a;
    return {
        inputTokens: a.inputTokens + b.inputTokens,
        outputTokens: a.outputTokens + b.outputTokens,
    };
}
