import { z } from 'zod';

const SEGMENT_SCHEMA = z.object({
    documentId: z.string().min(1),
    sequenceIndex: z.number().int().nonnegative(),
    text: z.string(),
    startOffset: z.number().int().nonnegative(),
    endOffset: z.number().int().nonnegative(),
});

export const SEGMENT_STORE_SCHEMA = z.object({
    version: z.number(),
    documents: z.record(z.string(), z.array(SEGMENT_SCHEMA)),
});

export type SegmentStoreData = z.infer<typeof SEGMENT_STORE_SCHEMA>;
