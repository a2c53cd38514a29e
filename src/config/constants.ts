/**
 * Configuration constants
 */

export const DEFAULT_STORE_DIR = '.quizforge';
export const SEGMENT_STORE_FILENAME = 'segments.json';
export const ALLOWED_EXTS = new Set(['.md', '.txt', '.mdx']);

// Chunking (character counts)
export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

// Retry policy
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 5000;

// Provenance tags for locally generated results
export const MOCK_MODEL_ID = 'mock';
export const RATE_LIMITED_MOCK_MODEL_ID = 'mock (rate-limited)';

// Evaluation
export const PASSING_SCORE_PERCENTAGE = 70;
