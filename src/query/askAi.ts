import type { Logger } from "pino";
import { InvalidConfigurationError } from "../errors";
import { toEmbedFn, toGenerateFn } from "../llm/factory";
import type { LLMClientBundle } from "../llm/types";
import type { EmbeddingIndex } from "../store/embeddingIndex";
import { childLogger, getLogger } from "../utils/logger";
import { composeAnswer } from "./composeAnswer";
import { retrieve } from "./retriever";

export interface AskAiOptions {
    question: string;
    topK: number;
    maxContextChunks: number;
}

export interface AskAiSource {
    documentId: string;
    chunkIndex: number;
    score: number;
}

export interface AskAiResult {
    answer: string;
    sources: AskAiSource[];
}

export async function askAi(
    llm: LLMClientBundle,
    index: EmbeddingIndex,
    options: AskAiOptions,
    logger?: Logger
): Promise<AskAiResult> {
    const activeLogger = childLogger(logger ?? getLogger(), { module: "query" });
    const trimmedQuestion = options.question.trim();

    if (!trimmedQuestion) {
        throw new InvalidConfigurationError("Question cannot be empty.");
    }

    activeLogger.info({ question: trimmedQuestion, topK: options.topK }, "Retrieving context for question.");
    const matches = await retrieve(
        index,
        { text: trimmedQuestion, k: options.topK },
        toEmbedFn(llm.embedding),
        activeLogger
    );

    if (matches.length === 0) {
        activeLogger.warn("Index returned no chunks; asking without context.");
    }

    const answer = await composeAnswer(trimmedQuestion, matches, toGenerateFn(llm.chat), {
        maxContextChunks: options.maxContextChunks,
    });

    const sources = matches.slice(0, options.maxContextChunks).map(({ chunk, score }) => ({
        documentId: chunk.documentId,
        chunkIndex: chunk.index,
        score,
    }));

    activeLogger.info({ sourceCount: sources.length }, "Answer generated.");
    return { answer, sources };
}
