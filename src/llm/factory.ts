import type { Logger } from "pino";
import { EmbeddingUnavailableError, GenerationUnavailableError, InvalidConfigurationError, describeError } from "../errors";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig } from "../config/types";
import { childLogger } from "../utils/logger";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import type { ChatProvider, EmbedFn, EmbeddingProvider, GenerateFn, LLMClientBundle } from "./types";

function providerLogger(logger: Logger | undefined, scope: "chat" | "embedding", provider: string): Logger | undefined {
    return logger ? childLogger(logger, { module: "llm", scope, provider }) : undefined;
}

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    const scopedLogger = providerLogger(logger, "embedding", config.provider);

    switch (config.provider) {
        case "openai":
            return new OpenAIEmbeddingProvider(config, scopedLogger);
        default:
            throw new InvalidConfigurationError(`Embedding provider "${config.provider}" is not supported.`);
    }
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    const scopedLogger = providerLogger(logger, "chat", config.provider);

    switch (config.provider) {
        case "openai":
            return new OpenAIChatProvider(config, scopedLogger);
        default:
            throw new InvalidConfigurationError(`Chat provider "${config.provider}" is not supported.`);
    }
}

export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    return {
        embedding: createEmbeddingProvider(config.embedding, logger),
        chat: createChatProvider(config.chat, logger),
    };
}

export function toEmbedFn(provider: EmbeddingProvider): EmbedFn {
    return async (text) => {
        try {
            return await provider.embedQuery(text);
        } catch (error) {
            throw new EmbeddingUnavailableError(`${provider.config.provider} (${describeError(error)})`, error);
        }
    };
}

export function toGenerateFn(provider: ChatProvider): GenerateFn {
    return async (prompt) => {
        try {
            return await provider.generate(prompt);
        } catch (error) {
            throw new GenerationUnavailableError(`${provider.config.provider} (${describeError(error)})`, error);
        }
    };
}
