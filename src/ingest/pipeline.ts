import type { Logger } from "pino";
import { EmbeddingUnavailableError, RagError, describeError } from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import type { EmbeddingIndex } from "../store/embeddingIndex";
import type { EmbeddedChunk } from "../store/types";
import { childLogger, getLogger } from "../utils/logger";
import { chunkDocument } from "./chunker";
import type { ChunkingOptions, Document, Tokenizer } from "./types";

export interface IndexingOptions extends ChunkingOptions {
    tokenizer: Tokenizer;
}

export interface IndexingStats {
    processedDocuments: number;
    skippedDocuments: number;
    insertedChunks: number;
}

/**
 * Chunks, embeds and inserts each document in turn. A document's chunks are
 * inserted as one batch, so queries never see half of a document.
 */
export async function indexDocuments(
    documents: readonly Document[],
    index: EmbeddingIndex,
    embedding: Pick<EmbeddingProvider, "embedDocuments">,
    options: IndexingOptions,
    logger?: Logger
): Promise<IndexingStats> {
    const ingestionLogger = childLogger(logger ?? getLogger(), { module: "ingest" });
    const stats: IndexingStats = {
        processedDocuments: 0,
        skippedDocuments: 0,
        insertedChunks: 0,
    };

    ingestionLogger.info(`Indexing ${documents.length} document${documents.length === 1 ? "" : "s"}.`);

    for (const document of documents) {
        const documentLogger = childLogger(ingestionLogger, { document: document.id });
        const chunks = chunkDocument(document, options, options.tokenizer);

        if (chunks.length === 0) {
            stats.skippedDocuments += 1;
            documentLogger.warn("No chunks were generated for this document. Skipping.");
            continue;
        }

        let vectors: number[][];
        try {
            vectors = await embedding.embedDocuments(chunks.map((chunk) => chunk.text));
        } catch (error) {
            if (error instanceof EmbeddingUnavailableError) {
                throw error;
            }
            throw new EmbeddingUnavailableError(`${document.id} (${describeError(error)})`, error);
        }
        if (vectors.length !== chunks.length) {
            throw new RagError(
                `Embedding returned ${vectors.length} vectors for ${chunks.length} chunks in ${document.id}.`
            );
        }

        const embedded: EmbeddedChunk[] = chunks.map((chunk, position) => ({ ...chunk, vector: vectors[position] }));
        index.insert(embedded);

        stats.processedDocuments += 1;
        stats.insertedChunks += embedded.length;
        documentLogger.debug({ chunkCount: embedded.length }, "Inserted document chunks.");
    }

    ingestionLogger.info(stats, "Indexing completed.");
    return stats;
}
