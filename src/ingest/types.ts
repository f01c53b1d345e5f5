export type DocumentMetadata = Readonly<Record<string, string | number | boolean>>;

export interface Document {
    readonly id: string;
    readonly text: string;
    readonly metadata: DocumentMetadata;
}

export interface Chunk {
    /** `${documentId}:${index}` */
    readonly id: string;
    readonly documentId: string;
    readonly index: number;
    /** Inclusive token offset into the document's tokenization. */
    readonly startToken: number;
    /** Exclusive token offset into the document's tokenization. */
    readonly endToken: number;
    readonly text: string;
    readonly checksum: string;
    readonly metadata: DocumentMetadata;
}

/**
 * Token-level view of text. Any tokenizer is interchangeable as long as
 * `sliceTokens(text, 0, countTokens(text))` covers the whole text.
 */
export interface Tokenizer {
    countTokens(text: string): number;
    sliceTokens(text: string, start: number, end: number): string;
}

export interface ChunkingOptions {
    chunkSize: number;
    overlap: number;
}
