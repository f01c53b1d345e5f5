import crypto from "node:crypto";
import { InvalidConfigurationError } from "../errors";
import type { Chunk, ChunkingOptions, Document, DocumentMetadata, Tokenizer } from "./types";

export function chunkChecksum(text: string): string {
    return crypto.createHash("sha256").update(text, "utf-8").digest("hex");
}

export function createDocument(id: string, text: string, metadata: DocumentMetadata = {}): Document {
    if (!id.trim()) {
        throw new InvalidConfigurationError("Document id cannot be empty.");
    }

    return Object.freeze({
        id,
        text,
        metadata: Object.freeze({ ...metadata }),
    });
}

export function assertChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new InvalidConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}.`);
    }

    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
        throw new InvalidConfigurationError(
            `overlap must be an integer in [0, chunkSize), got ${overlap} with chunkSize ${chunkSize}.`
        );
    }
}

/**
 * Splits a document into windows of `chunkSize` tokens advanced by
 * `chunkSize - overlap`. The last window is truncated to the remaining
 * tokens and always kept, so every token lands in at least one chunk.
 */
export function chunkDocument(document: Document, options: ChunkingOptions, tokenizer: Tokenizer): Chunk[] {
    assertChunkingOptions(options);

    const { chunkSize, overlap } = options;
    const totalTokens = document.text ? tokenizer.countTokens(document.text) : 0;
    const stride = chunkSize - overlap;
    const chunks: Chunk[] = [];

    for (let start = 0; start < totalTokens; start += stride) {
        const end = Math.min(start + chunkSize, totalTokens);
        const text = tokenizer.sliceTokens(document.text, start, end);
        const index = chunks.length;

        chunks.push(Object.freeze({
            id: `${document.id}:${index}`,
            documentId: document.id,
            index,
            startToken: start,
            endToken: end,
            text,
            checksum: chunkChecksum(text),
            metadata: document.metadata,
        }));

        if (end === totalTokens) {
            break;
        }
    }

    return chunks;
}
