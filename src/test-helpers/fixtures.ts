import pino from "pino";
import type { Chunk, Tokenizer } from "../ingest/types";
import type { EmbeddedChunk } from "../store/types";

/** One token per whitespace-separated word; slices are re-joined with single spaces. */
export const wordTokenizer: Tokenizer = {
    countTokens: (text) => words(text).length,
    sliceTokens: (text, start, end) => words(text).slice(start, end).join(" "),
};

export function words(text: string): string[] {
    return text.split(/\s+/).filter(Boolean);
}

export function numberedWords(count: number): string {
    return Array.from({ length: count }, (_, i) => `w${i}`).join(" ");
}

export function makeChunk(id: string, text = `text of ${id}`, documentId = "doc", index = 0): Chunk {
    return {
        id,
        documentId,
        index,
        startToken: 0,
        endToken: words(text).length,
        text,
        checksum: `checksum-${id}`,
        metadata: {},
    };
}

export function embedded(id: string, vector: number[], index = 0): EmbeddedChunk {
    return { ...makeChunk(id, `text of ${id}`, "doc", index), vector };
}

export const silentLogger = pino({ level: "silent" });
