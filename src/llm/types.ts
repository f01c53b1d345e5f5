import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

/** Text in, fixed-length vector out. */
export type EmbedFn = (text: string) => Promise<number[]>;

/** Prompt in, raw completion text out. */
export type GenerateFn = (prompt: string) => Promise<string>;

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface GenerateOptions {
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(query: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
