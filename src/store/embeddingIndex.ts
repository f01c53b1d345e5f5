import {
    DimensionMismatchError,
    DuplicateChunkError,
    InvalidConfigurationError,
    InvalidEmbeddingError,
} from "../errors";
import { formatIssues } from "../utils/formatIssues";
import { indexSnapshotSchema } from "./schema";
import { cosineSimilarity, norm } from "./similarity";
import type { EmbeddedChunk, IndexSnapshot, RetrievalResult } from "./types";

interface StoredEntry {
    chunk: EmbeddedChunk;
    norm: number;
}

/**
 * Append-only store of embedded chunks with exact cosine top-k search.
 *
 * Every method runs to completion synchronously, so a batch passed to
 * `insert` is either fully visible to the next `query` or not at all.
 */
export class EmbeddingIndex {
    private readonly entries: StoredEntry[] = [];
    private readonly ids = new Set<string>();
    private dimensionValue: number | null = null;

    get size(): number {
        return this.entries.length;
    }

    /** Established by the first non-empty insertion. */
    get dimension(): number | null {
        return this.dimensionValue;
    }

    has(id: string): boolean {
        return this.ids.has(id);
    }

    get(id: string): EmbeddedChunk | undefined {
        return this.entries.find((entry) => entry.chunk.id === id)?.chunk;
    }

    insert(embeddedChunks: readonly EmbeddedChunk[]): void {
        if (embeddedChunks.length === 0) {
            return;
        }

        const dimension = this.dimensionValue ?? embeddedChunks[0].vector.length;
        const batchIds = new Set<string>();
        const norms: number[] = [];

        for (const chunk of embeddedChunks) {
            if (chunk.vector.length === 0) {
                throw new InvalidEmbeddingError(chunk.id, "vector is empty");
            }
            if (chunk.vector.length !== dimension) {
                throw new DimensionMismatchError(dimension, chunk.vector.length, `chunk "${chunk.id}"`);
            }
            if (!chunk.vector.every(Number.isFinite)) {
                throw new InvalidEmbeddingError(chunk.id, "vector contains a non-finite value");
            }
            const chunkNorm = norm(chunk.vector);
            if (!Number.isFinite(chunkNorm)) {
                throw new InvalidEmbeddingError(chunk.id, "vector norm overflows");
            }
            norms.push(chunkNorm);
            if (this.ids.has(chunk.id) || batchIds.has(chunk.id)) {
                throw new DuplicateChunkError(chunk.id);
            }
            batchIds.add(chunk.id);
        }

        embeddedChunks.forEach((chunk, i) => {
            const stored = Object.freeze({ ...chunk, vector: Object.freeze([...chunk.vector]) });
            this.entries.push({ chunk: stored, norm: norms[i] });
            this.ids.add(chunk.id);
        });
        this.dimensionValue = dimension;
    }

    query(vector: readonly number[], k: number): RetrievalResult {
        if (!Number.isInteger(k) || k <= 0) {
            throw new InvalidConfigurationError(`k must be a positive integer, got ${k}.`);
        }

        if (this.entries.length === 0) {
            return [];
        }

        if (this.dimensionValue !== null && vector.length !== this.dimensionValue) {
            throw new DimensionMismatchError(this.dimensionValue, vector.length, "query vector");
        }

        if (!vector.every(Number.isFinite)) {
            throw new InvalidEmbeddingError(null, "vector contains a non-finite value");
        }
        const queryNorm = norm(vector);
        if (!Number.isFinite(queryNorm)) {
            throw new InvalidEmbeddingError(null, "vector norm overflows");
        }

        const scored = this.entries.map((entry, position) => ({
            entry,
            position,
            score: cosineSimilarity(vector, entry.chunk.vector, queryNorm, entry.norm),
        }));

        scored.sort((a, b) => b.score - a.score || a.position - b.position);

        return scored
            .slice(0, Math.min(k, scored.length))
            .map(({ entry, score }) => {
                const { vector: _vector, ...chunk } = entry.chunk;
                return { chunk, score };
            });
    }

    toSnapshot(): IndexSnapshot {
        return {
            version: 1,
            dimension: this.dimensionValue,
            entries: this.entries.map(({ chunk }) => ({
                ...chunk,
                metadata: { ...chunk.metadata },
                vector: [...chunk.vector],
            })),
        };
    }

    static fromSnapshot(snapshot: unknown): EmbeddingIndex {
        const parsed = indexSnapshotSchema.safeParse(snapshot);
        if (!parsed.success) {
            throw new InvalidConfigurationError(`Index snapshot is malformed: ${formatIssues(parsed.error)}`);
        }

        const { dimension, entries } = parsed.data;
        if (dimension === null && entries.length > 0) {
            throw new InvalidConfigurationError("Index snapshot has entries but no dimension.");
        }

        const index = new EmbeddingIndex();
        index.dimensionValue = dimension;
        index.insert(entries);
        return index;
    }
}
