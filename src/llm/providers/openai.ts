import type { Logger } from "pino";
import { z } from "zod";
import { InvalidConfigurationError } from "../../errors";
import { BaseChatProvider, BaseEmbeddingProvider, mergeLimits } from "../base";
import { formatIssues } from "../../utils/formatIssues";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions, GenerateOptions } from "../types";

const openAIErrorSchema = z.object({
    error: z.object({
        message: z.string(),
    }),
});

const embeddingResponseSchema = z.object({
    data: z.array(
        z.object({
            index: z.number().int(),
            embedding: z.array(z.number()),
        })
    ),
});

const chatCompletionResponseSchema = z.object({
    choices: z.array(
        z.object({
            message: z.object({
                content: z.string().nullable().optional(),
            }),
        })
    ),
});

const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1/";

function resolveBaseUrl(url?: string): string {
    if (!url) {
        return OPENAI_DEFAULT_BASE_URL;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

async function parseOpenAIError(response: Response, fallback: string): Promise<never> {
    const body: unknown = await response.json().catch(() => undefined);
    const parsed = openAIErrorSchema.safeParse(body);
    throw new Error(parsed.success ? parsed.data.error.message : fallback);
}

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new InvalidConfigurationError("OpenAI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 4,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 1_000_000,
                    retries: 3,
                },
                config.limits
            ),
            logger
        );

        this.apiKey = config.apiKey;
        this.baseUrl = resolveBaseUrl(config.baseUrl);
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        const url = new URL("embeddings", this.baseUrl);
        const response = await fetch(url, {
            method: "POST",
            headers: {
                "Content-Type": "application/json",
                Authorization: `Bearer ${this.apiKey}`,
            },
            body: JSON.stringify({
                model: this.config.model,
                input: texts,
            }),
            signal: options?.signal,
        });

        if (!response.ok) {
            await parseOpenAIError(response, `OpenAI embedding request failed with status ${response.status}.`);
        }

        const payload = embeddingResponseSchema.safeParse(await response.json());
        if (!payload.success) {
            throw new Error(`OpenAI embedding response is malformed: ${formatIssues(payload.error)}`);
        }

        return [...payload.data.data]
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    }
}

export class OpenAIChatProvider extends BaseChatProvider {
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new InvalidConfigurationError("OpenAI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 2,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                    retries: 3,
                },
                config.limits
            ),
            logger
        );

        this.apiKey = config.apiKey;
        this.baseUrl = resolveBaseUrl(config.baseUrl);
    }

    protected async complete(prompt: string, options: GenerateOptions): Promise<string> {
        const url = new URL("chat/completions", this.baseUrl);
        const response = await fetch(url, {
            method: "POST",
            headers: {
                "Content-Type": "application/json",
                Authorization: `Bearer ${this.apiKey}`,
            },
            body: JSON.stringify({
                model: this.config.model,
                temperature: options.temperature ?? this.config.temperature,
                max_tokens: options.maxTokens ?? this.config.maxOutputTokens,
                messages: [{ role: "user", content: prompt }],
            }),
            signal: options.signal,
        });

        if (!response.ok) {
            await parseOpenAIError(response, `OpenAI chat completion failed with status ${response.status}.`);
        }

        const payload = chatCompletionResponseSchema.safeParse(await response.json());
        if (!payload.success) {
            throw new Error(`OpenAI chat completion response is malformed: ${formatIssues(payload.error)}`);
        }

        const content = payload.data.choices[0]?.message.content;
        if (typeof content !== "string") {
            throw new Error("OpenAI returned an empty chat completion response.");
        }

        return content;
    }
}
