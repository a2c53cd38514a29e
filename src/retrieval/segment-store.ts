import type { Segment } from '../chunking/types';

/**
 * Persistence boundary for document segments.
 * listSegments must return segments ordered by sequenceIndex.
 */
export interface SegmentStore {
  deleteAllSegments(documentId: string): Promise<void>;
  saveSegments(segments: Segment[]): Promise<void>;
  listSegments(documentId: string): Promise<Segment[]>;
  countSegments(documentId: string): Promise<number>;
  /**
   * Deletes every stored segment of the document and inserts the given ones as one
   * unit: readers see either the old set or the new set, never a mix.
   */
  replaceSegments(documentId: string, segments: Segment[]): Promise<void>;
}

export function bySequenceIndex(a: Segment, b: Segment): number {
  return a.sequenceIndex - b.sequenceIndex;
}
