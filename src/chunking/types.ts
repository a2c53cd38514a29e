export interface Segment {
  documentId: string;
  sequenceIndex: number;
  text: string; // trimmed
  startOffset: number;
  endOffset: number;
}

export interface ChunkingOptions {
  targetSize?: number; // Soft upper bound in characters
  overlapWidth?: number; // Trailing characters carried into the next segment
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(documentId: string, content: string, options?: ChunkingOptions): Segment[];
}
