import type { Segment, ChunkingOptions, ChunkingStrategy } from '../chunking/types';
import { ParagraphChunker } from '../chunking/chunker';
import { PARAGRAPH_SEPARATOR } from '../chunking/utils';
import { ValidationError } from '../errors/index';
import { log } from '../output/logger';
import type { SegmentStore } from './segment-store';

export interface RetrieverOptions {
  chunking?: ChunkingOptions;
  chunker?: ChunkingStrategy;
}

/**
 * Even-stride selection: indices 0, stride, 2*stride, ... with stride = floor(total / n).
 * Returns the input unchanged when it already has n items or fewer.
 */
export function sampleEvenly<T>(items: readonly T[], n: number): T[] {
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`Sample size must be a positive integer, got ${n}`);
  }
  if (items.length <= n) {
    return [...items];
  }

  const stride = Math.floor(items.length / n);
  const sampled: T[] = [];
  for (let i = 0; i < n && i * stride < items.length; i++) {
    const item = items[i * stride];
    if (item !== undefined) sampled.push(item);
  }
  return sampled;
}

function joinTexts(segments: Segment[]): string {
  return segments.map((s) => s.text).join(PARAGRAPH_SEPARATOR);
}

/**
 * Builds generation context from the stored segments of a document.
 */
export class SegmentRetriever {
  private readonly chunker: ChunkingStrategy;
  private readonly chunking: ChunkingOptions;

  constructor(private readonly store: SegmentStore, options: RetrieverOptions = {}) {
    this.chunker = options.chunker ?? new ParagraphChunker();
    this.chunking = options.chunking ?? {};
  }

  /**
   * Chunks the document and replaces its stored segments in one step.
   */
  async indexDocument(documentId: string, content: string): Promise<Segment[]> {
    assertDocumentId(documentId);
    log(`Indexing document: ${documentId}`);
    const segments = this.chunker.chunk(documentId, content, this.chunking);
    await this.store.replaceSegments(documentId, segments);
    log(`Indexed ${segments.length} segment(s) for document: ${documentId}`);
    return segments;
  }

  async segments(documentId: string): Promise<Segment[]> {
    assertDocumentId(documentId);
    return this.store.listSegments(documentId);
  }

  async fullContext(documentId: string): Promise<string> {
    return joinTexts(await this.segments(documentId));
  }

  /**
   * Case-insensitive substring match, in sequence order.
   */
  async byKeyword(documentId: string, keyword: string): Promise<Segment[]> {
    const needle = keyword.toLowerCase();
    const segments = await this.segments(documentId);
    return segments.filter((s) => s.text.toLowerCase().includes(needle));
  }

  async sample(documentId: string, n: number): Promise<Segment[]> {
    return sampleEvenly(await this.segments(documentId), n);
  }

  async sampledContext(documentId: string, n: number): Promise<string> {
    return joinTexts(await this.sample(documentId, n));
  }

  async isIndexed(documentId: string): Promise<boolean> {
    assertDocumentId(documentId);
    return (await this.store.countSegments(documentId)) > 0;
  }
}

function assertDocumentId(documentId: string): void {
  if (!documentId.trim()) {
    throw new ValidationError('Document id must not be blank');
  }
}
