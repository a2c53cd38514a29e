import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import * as path from 'path';
import type { Segment } from '../chunking/types';
import { SEGMENT_STORE_SCHEMA, type SegmentStoreData } from '../schemas/store-schema';
import { DEFAULT_STORE_DIR, SEGMENT_STORE_FILENAME } from '../config/constants';
import { ProcessingError, handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';
import { bySequenceIndex, type SegmentStore } from './segment-store';

/**
 * Store schema version. Bump this to discard existing stores
 * when the persisted segment structure changes.
 */
const STORE_VERSION = 1;

function emptyStore(): SegmentStoreData {
    return { version: STORE_VERSION, documents: {} };
}

/**
 * JSON-file segment store. Stores segments in .quizforge/segments.json by default.
 *
 * Every write goes to a temporary file that is renamed over the store file, so a
 * reader always loads either the previous or the next complete state.
 */
export class FileSegmentStore implements SegmentStore {
    private readonly storeDir: string;
    private readonly storeFile: string;

    constructor(cwd: string = process.cwd(), storeDir: string = DEFAULT_STORE_DIR) {
        this.storeDir = path.resolve(cwd, storeDir);
        this.storeFile = path.join(this.storeDir, SEGMENT_STORE_FILENAME);
    }

    get filePath(): string {
        return this.storeFile;
    }

    private load(): SegmentStoreData {
        if (!existsSync(this.storeFile)) {
            return emptyStore();
        }

        let json: unknown;
        try {
            json = JSON.parse(readFileSync(this.storeFile, 'utf-8'));
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Reading segment store');
            warn(`Could not read segment store, starting fresh: ${err.message}`);
            return emptyStore();
        }

        const result = SEGMENT_STORE_SCHEMA.safeParse(json);
        if (!result.success) {
            warn(`Segment store validation failed, starting fresh: ${result.error.message}`);
            return emptyStore();
        }

        if (result.data.version !== STORE_VERSION) {
            warn('Segment store version mismatch, clearing store');
            return emptyStore();
        }

        return result.data;
    }

    private write(data: SegmentStoreData): void {
        try {
            if (!existsSync(this.storeDir)) {
                mkdirSync(this.storeDir, { recursive: true });
            }
            const tmpFile = `${this.storeFile}.${process.pid}.tmp`;
            writeFileSync(tmpFile, JSON.stringify(data, null, 2), 'utf-8');
            renameSync(tmpFile, this.storeFile);
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Writing segment store');
            throw new ProcessingError(`Could not save segment store: ${err.message}`);
        }
    }

    async deleteAllSegments(documentId: string): Promise<void> {
        const data = this.load();
        if (documentId in data.documents) {
            delete data.documents[documentId];
            this.write(data);
        }
    }

    async saveSegments(segments: Segment[]): Promise<void> {
        if (segments.length === 0) return;
        const data = this.load();
        for (const segment of segments) {
            const existing = data.documents[segment.documentId] ?? [];
            existing.push({ ...segment });
            data.documents[segment.documentId] = existing;
        }
        this.write(data);
    }

    async listSegments(documentId: string): Promise<Segment[]> {
        const segments = this.load().documents[documentId] ?? [];
        return [...segments].sort(bySequenceIndex);
    }

    async countSegments(documentId: string): Promise<number> {
        return this.load().documents[documentId]?.length ?? 0;
    }

    async replaceSegments(documentId: string, segments: Segment[]): Promise<void> {
        const data = this.load();
        data.documents[documentId] = segments.map((s) => ({ ...s, documentId }));
        this.write(data);
    }
}
