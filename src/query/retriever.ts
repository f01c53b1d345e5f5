import type { Logger } from "pino";
import { EmbeddingUnavailableError, InvalidConfigurationError, describeError } from "../errors";
import type { EmbedFn } from "../llm/types";
import type { EmbeddingIndex } from "../store/embeddingIndex";
import type { RetrievalResult } from "../store/types";

export interface Query {
    text: string;
    k: number;
}

/**
 * Embeds the query text once and ranks the index against it. Embedding
 * failures surface as `EmbeddingUnavailableError` without any retry.
 */
export async function retrieve(
    index: EmbeddingIndex,
    query: Query,
    embed: EmbedFn,
    logger?: Logger
): Promise<RetrievalResult> {
    if (!Number.isInteger(query.k) || query.k <= 0) {
        throw new InvalidConfigurationError(`k must be a positive integer, got ${query.k}.`);
    }

    let vector: number[];
    try {
        vector = await embed(query.text);
    } catch (error) {
        if (error instanceof EmbeddingUnavailableError) {
            throw error;
        }
        throw new EmbeddingUnavailableError(describeError(error), error);
    }

    const result = index.query(vector, query.k);
    logger?.debug({ k: query.k, indexSize: index.size, returned: result.length }, "Retrieved chunks for query.");
    return result;
}
