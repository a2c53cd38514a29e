// Base error class for all quizforge errors
export class QuizforgeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'QuizforgeError';
  }
}

// Validation error for schema validation failures and precondition violations
export class ValidationError extends QuizforgeError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for environment and option issues
export class ConfigError extends QuizforgeError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for business logic failures
export class ProcessingError extends QuizforgeError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Failure reported by a model provider call; status is the HTTP status when the SDK exposes one
export class ProviderError extends QuizforgeError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number
  ) {
    super(message, 'PROVIDER_ERROR');
    this.name = 'ProviderError';
  }
}

// Raised when a caller's abort signal or timeout stops a generation run
export class GenerationCancelledError extends QuizforgeError {
  constructor(message = 'Generation cancelled', public readonly reason?: unknown) {
    super(message, 'CANCELLED');
    this.name = 'GenerationCancelledError';
  }
}

export function isGenerationCancelled(e: unknown): e is GenerationCancelledError {
  return e instanceof GenerationCancelledError;
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
