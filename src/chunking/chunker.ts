import type { Segment, ChunkingOptions, ChunkingStrategy } from "./types";
import { PARAGRAPH_SEPARATOR, splitParagraphsWithOffsets } from "./utils";
import { ValidationError } from "../errors/index";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../config/constants";

const DEFAULT_OPTIONS: Required<ChunkingOptions> = {
  targetSize: DEFAULT_CHUNK_SIZE,
  overlapWidth: DEFAULT_CHUNK_OVERLAP,
};

/**
 * Greedy paragraph packer. Paragraphs accumulate into a buffer until the next one
 * would push it past targetSize; the buffer is then emitted and the next buffer is
 * seeded with its trailing overlapWidth characters.
 *
 * targetSize is a soft bound: a paragraph longer than it is emitted whole.
 * Offsets are exact when paragraphs are separated by exactly one blank line;
 * longer blank-line runs make the start offset of an overlapped segment approximate.
 */
export class ParagraphChunker implements ChunkingStrategy {
  readonly name = "paragraph";

  chunk(documentId: string, content: string, options?: ChunkingOptions): Segment[] {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(opts.targetSize) || opts.targetSize < 1) {
      throw new ValidationError(`targetSize must be a positive integer, got ${opts.targetSize}`);
    }
    if (!Number.isInteger(opts.overlapWidth) || opts.overlapWidth < 0) {
      throw new ValidationError(`overlapWidth must be a non-negative integer, got ${opts.overlapWidth}`);
    }

    const segments: Segment[] = [];
    if (!content.trim()) {
      return segments;
    }

    let buffer = "";
    let startOffset = 0;
    let position = 0;

    const emit = (): void => {
      const text = buffer.trim();
      if (!text) return;
      segments.push({
        documentId,
        sequenceIndex: segments.length,
        text,
        startOffset,
        endOffset: position,
      });
    };

    for (const paragraph of splitParagraphsWithOffsets(content)) {
      if (paragraph.text.length > 0) {
        if (buffer.length + paragraph.text.length > opts.targetSize && buffer.length > 0) {
          emit();
          const overlapStart = Math.max(0, buffer.length - opts.overlapWidth);
          buffer = buffer.substring(overlapStart);
          startOffset = position - buffer.length;
        }
        buffer += paragraph.text + PARAGRAPH_SEPARATOR;
      }
      position += paragraph.text.length + paragraph.separatorLength;
    }

    if (buffer.length > 0) {
      emit();
    }

    return segments;
  }
}

export function chunkDocument(
  documentId: string,
  content: string,
  options?: ChunkingOptions
): Segment[] {
  return new ParagraphChunker().chunk(documentId, content, options);
}
