import { describe, it, expect, beforeEach } from 'vitest';
import { SegmentRetriever, sampleEvenly } from '../src/retrieval/retriever';
import { InMemorySegmentStore } from '../src/retrieval/in-memory-segment-store';
import type { Segment } from '../src/chunking/types';
import { ValidationError } from '../src/errors/index';

function makeSegments(documentId: string, count: number): Segment[] {
  return Array.from({ length: count }, (_, i) => ({
    documentId,
    sequenceIndex: i,
    text: `segment ${i}`,
    startOffset: i * 10,
    endOffset: i * 10 + 9,
  }));
}

describe('sampleEvenly', () => {
  it('returns everything when there are n items or fewer', () => {
    expect(sampleEvenly([1, 2, 3], 3)).toEqual([1, 2, 3]);
    expect(sampleEvenly([1, 2], 5)).toEqual([1, 2]);
  });

  it('picks indices at an even stride', () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    expect(sampleEvenly(items, 3)).toEqual([0, 3, 6]);
    expect(sampleEvenly(items, 4)).toEqual([0, 2, 4, 6]);
    expect(sampleEvenly(items, 9)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('never returns more than n items and is deterministic', () => {
    const items = Array.from({ length: 37 }, (_, i) => i);
    for (let n = 1; n <= 40; n++) {
      const first = sampleEvenly(items, n);
      expect(first.length).toBeLessThanOrEqual(n);
      expect(sampleEvenly(items, n)).toEqual(first);
    }
  });

  it('rejects a sample size below one', () => {
    expect(() => sampleEvenly([1, 2, 3], 0)).toThrow(ValidationError);
  });
});

describe('SegmentRetriever', () => {
  let store: InMemorySegmentStore;
  let retriever: SegmentRetriever;

  beforeEach(() => {
    store = new InMemorySegmentStore();
    retriever = new SegmentRetriever(store, { chunking: { targetSize: 20, overlapWidth: 5 } });
  });

  it('indexes a document and reports it as indexed', async () => {
    expect(await retriever.isIndexed('course-1')).toBe(false);

    const segments = await retriever.indexDocument('course-1', `${'a'.repeat(10)}\n\n${'b'.repeat(10)}\n\n${'c'.repeat(10)}`);

    expect(segments).toHaveLength(3);
    expect(await retriever.isIndexed('course-1')).toBe(true);
    expect(await store.countSegments('course-1')).toBe(3);
  });

  it('replaces all previous segments on re-index', async () => {
    await retriever.indexDocument('course-1', `${'a'.repeat(10)}\n\n${'b'.repeat(10)}\n\n${'c'.repeat(10)}`);
    await retriever.indexDocument('course-1', 'Only one short paragraph.');

    const segments = await retriever.segments('course-1');
    expect(segments.map((s) => s.text)).toEqual(['Only one short paragraph.']);
  });

  it('joins the full context with blank lines in sequence order', async () => {
    await store.saveSegments([...makeSegments('doc', 3)].reverse());
    expect(await retriever.fullContext('doc')).toBe('segment 0\n\nsegment 1\n\nsegment 2');
  });

  it('filters by keyword without regard to case, keeping order', async () => {
    await store.saveSegments([
      { documentId: 'doc', sequenceIndex: 0, text: 'Photosynthesis basics', startOffset: 0, endOffset: 21 },
      { documentId: 'doc', sequenceIndex: 1, text: 'Cell division', startOffset: 21, endOffset: 34 },
      { documentId: 'doc', sequenceIndex: 2, text: 'More on PHOTOSYNTHESIS', startOffset: 34, endOffset: 56 },
    ]);

    const matches = await retriever.byKeyword('doc', 'photosynthesis');
    expect(matches.map((s) => s.sequenceIndex)).toEqual([0, 2]);
  });

  it('samples stored segments at an even stride', async () => {
    await store.saveSegments(makeSegments('doc', 10));

    const sampled = await retriever.sample('doc', 3);
    expect(sampled.map((s) => s.sequenceIndex)).toEqual([0, 3, 6]);
    expect(await retriever.sampledContext('doc', 3)).toBe('segment 0\n\nsegment 3\n\nsegment 6');
  });

  it('returns every segment when the sample is larger than the document', async () => {
    await store.saveSegments(makeSegments('doc', 2));
    expect(await retriever.sample('doc', 5)).toHaveLength(2);
  });

  it('rejects a blank document id', async () => {
    await expect(retriever.isIndexed('  ')).rejects.toThrow(ValidationError);
  });
});
