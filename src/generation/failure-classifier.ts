import { ProviderError } from '../errors/index';

export enum FailureKind {
  Retryable = 'retryable',
  Fatal = 'fatal',
}

export type FailureClassifier = (error: unknown) => FailureKind;

const RATE_LIMIT_STATUS = 429;
// Whole-word terms only: request URLs such as ':generateContent' must not match "rate"
const RATE_LIMIT_PATTERN = /\b429\b|\brate[ _-]?limit|\bquota|resource_exhausted/i;

function statusOf(error: unknown): number | undefined {
  if (error instanceof ProviderError) return error.status;
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : '';
}

/**
 * Rate-limit, quota and resource-exhaustion failures are worth retrying; everything
 * else is not. A known HTTP status decides on its own (429 retries, any other status
 * is fatal); the message is only consulted when there is no status.
 */
export const classifyRateLimitFailure: FailureClassifier = (error) => {
  const status = statusOf(error);
  if (status !== undefined) {
    return status === RATE_LIMIT_STATUS ? FailureKind.Retryable : FailureKind.Fatal;
  }
  return RATE_LIMIT_PATTERN.test(messageOf(error)) ? FailureKind.Retryable : FailureKind.Fatal;
};
