export class RagError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause !== undefined ? { cause } : undefined);
        this.name = "RagError";
    }
}

export class InvalidConfigurationError extends RagError {
    constructor(message: string) {
        super(message);
        this.name = "InvalidConfigurationError";
    }
}

export class DimensionMismatchError extends RagError {
    constructor(
        public readonly expected: number,
        public readonly actual: number,
        detail?: string
    ) {
        super(`Embedding dimension mismatch: expected ${expected}, got ${actual}${detail ? ` (${detail})` : ""}.`);
        this.name = "DimensionMismatchError";
    }
}

export class DuplicateChunkError extends RagError {
    constructor(public readonly chunkId: string) {
        super(`Chunk "${chunkId}" is already present in the index.`);
        this.name = "DuplicateChunkError";
    }
}

export class InvalidEmbeddingError extends RagError {
    /** `chunkId` is null for a query vector. */
    constructor(public readonly chunkId: string | null, reason: string) {
        super(`${chunkId === null ? "Query embedding" : `Embedding for chunk "${chunkId}"`} is invalid: ${reason}.`);
        this.name = "InvalidEmbeddingError";
    }
}

export class EmbeddingUnavailableError extends RagError {
    constructor(detail: string, cause?: unknown) {
        super(`Embedding unavailable: ${detail}`, cause);
        this.name = "EmbeddingUnavailableError";
    }
}

export class GenerationUnavailableError extends RagError {
    constructor(detail: string, cause?: unknown) {
        super(`Generation unavailable: ${detail}`, cause);
        this.name = "GenerationUnavailableError";
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
