import type { Chunk } from "../ingest/types";

export interface EmbeddedChunk extends Chunk {
    readonly vector: readonly number[];
}

export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}

/** Ranked best first; never longer than the requested k. */
export type RetrievalResult = ScoredChunk[];

export interface IndexSnapshot {
    version: 1;
    dimension: number | null;
    entries: EmbeddedChunk[];
}
