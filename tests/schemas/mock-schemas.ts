/**
 * Type-safe shapes for mock SDK error classes and clients
 */

export interface MockAPIErrorParams {
  message: string;
  status?: number;
}

export interface MockStatusErrorParams {
  message?: string;
}

export type MockCreateFn = (params: unknown, options?: unknown) => Promise<unknown>;

export interface MockOpenAIClient {
  chat: {
    completions: {
      create: MockCreateFn;
    };
  };
}

export interface MockAnthropicClient {
  messages: {
    create: MockCreateFn;
  };
}

export interface MockGeminiClient {
  getGenerativeModel: (params: unknown) => {
    generateContent: MockCreateFn;
  };
}
