import { describe, it, expect } from 'vitest';
import { addUsage, type TokenUsage } from '../src/types/token-usage';

describe('Token Usage Accumulation', () => {
    it('should sum input and output tokens', () => {
        const first: TokenUsage = { inputTokens: 100, outputTokens: 20 };
        const second: TokenUsage = { inputTokens: 50, outputTokens: 5 };

        expect(addUsage(first, second)).toEqual({ inputTokens: 150, outputTokens: 25 });
    });

    it('should keep the known side when the other is missing', () => {
        const usage: TokenUsage = { inputTokens: 10, outputTokens: 1 };

        expect(addUsage(undefined, usage)).toBe(usage);
        expect(addUsage(usage, undefined)).toBe(usage);
    });

    it('should return undefined when neither side reported usage', () => {
        expect(addUsage(undefined, undefined)).toBeUndefined();
    });
});
