import type { Segment } from '../chunking/types';
import { bySequenceIndex, type SegmentStore } from './segment-store';

export class InMemorySegmentStore implements SegmentStore {
  private readonly documents = new Map<string, Segment[]>();

  async deleteAllSegments(documentId: string): Promise<void> {
    this.documents.delete(documentId);
  }

  async saveSegments(segments: Segment[]): Promise<void> {
    for (const segment of segments) {
      const existing = this.documents.get(segment.documentId) ?? [];
      this.documents.set(segment.documentId, [...existing, { ...segment }]);
    }
  }

  async listSegments(documentId: string): Promise<Segment[]> {
    const segments = this.documents.get(documentId) ?? [];
    return [...segments].sort(bySequenceIndex);
  }

  async countSegments(documentId: string): Promise<number> {
    return this.documents.get(documentId)?.length ?? 0;
  }

  async replaceSegments(documentId: string, segments: Segment[]): Promise<void> {
    // Single synchronous swap, so no reader can interleave
    this.documents.set(
      documentId,
      segments.map((s) => ({ ...s, documentId }))
    );
  }
}
