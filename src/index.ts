export * from "./errors";

export type { Chunk, ChunkingOptions, Document, DocumentMetadata, Tokenizer } from "./ingest/types";
export { assertChunkingOptions, chunkDocument, createDocument } from "./ingest/chunker";
export { indexDocuments, type IndexingOptions, type IndexingStats } from "./ingest/pipeline";
export { loadTextDocuments } from "./ingest/textFiles";

export type { EmbeddedChunk, IndexSnapshot, RetrievalResult, ScoredChunk } from "./store/types";
export { EmbeddingIndex } from "./store/embeddingIndex";
export { cosineSimilarity } from "./store/similarity";
export { loadIndexSnapshot, saveIndexSnapshot } from "./store/snapshotFile";

export { retrieve, type Query } from "./query/retriever";
export { composeAnswer, type ComposeOptions } from "./query/composeAnswer";
export { askAi, type AskAiOptions, type AskAiResult, type AskAiSource } from "./query/askAi";

export type {
    ChatProvider,
    EmbedFn,
    EmbeddingProvider,
    GenerateFn,
    LLMClientBundle,
} from "./llm/types";
export { buildAnswerPrompt, formatContextBlock } from "./llm/prompt";
export { createChatProvider, createEmbeddingProvider, createLLMClient, toEmbedFn, toGenerateFn } from "./llm/factory";
export { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./llm/providers/openai";

export type { AppConfig } from "./config/types";
export { buildAppConfig, loadAppConfig, resolveConfigPath } from "./config/loadConfig";
export { configureLogger, getLogger } from "./utils/logger";
export { countTokens, createTiktokenTokenizer } from "./utils/tokenEncoder";
