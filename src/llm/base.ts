import pLimit from "p-limit";
import pRetry from "p-retry";
import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, ProviderLimitsConfig } from "../config/types";
import { batchChunks } from "../utils/batchChunks";
import { createRateLimiter, reserveWeight } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateOptions } from "./types";

export type ProviderRateLimits = ProviderLimitsConfig;

export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const defined = Object.fromEntries(
        Object.entries(override).filter(([, value]) => value !== undefined)
    );
    return { ...defaults, ...defined };
}

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

/**
 * Request and token budgets shared by every call a provider makes, plus
 * retries with a warning per failed attempt.
 */
class ProviderScheduler {
    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;
    private readonly maxTokensPerMinute?: number;

    constructor(
        readonly concurrency: number,
        private readonly retries: number,
        limits: ProviderRateLimits,
        private readonly logger?: Logger
    ) {
        this.requestLimiter = createRateLimiter({ concurrency, perMinute: limits.maxRequestsPerMinute });

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            this.maxTokensPerMinute = limits.maxTokensPerMinute;
            // Bottleneck counts job weight against maxConcurrent as well as the reservoir.
            this.tokenLimiter = createRateLimiter({
                concurrency: Math.max(concurrency, Math.ceil(limits.maxTokensPerMinute)),
                perMinute: limits.maxTokensPerMinute,
            });
        }
    }

    async schedule<T>(tokens: number, task: () => Promise<T>, { logPrefix, signal }: ScheduleOptions): Promise<T> {
        await reserveWeight(this.tokenLimiter, Math.min(tokens, this.maxTokensPerMinute ?? tokens));

        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                onFailedAttempt: (error: pRetry.FailedAttemptError) => {
                    if (signal?.aborted) {
                        throw error;
                    }
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    protected readonly batchSize: number;
    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = limits.batchSize ?? 50;
        this.scheduler = new ProviderScheduler(
            Math.max(1, limits.concurrency ?? 5),
            limits.retries ?? 5,
            limits,
            logger
        );
    }

    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = batchChunks(texts, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: countTokensInBatch(batch, this.config.model),
        }));

        const limit = pLimit(this.scheduler.concurrency);
        const logPrefix = `${this.config.provider}:embed`;
        const results = await Promise.all(
            batches.map(({ batch, idx, tokens }) =>
                limit(async () => {
                    const embeddings = await this.scheduler.schedule(
                        tokens,
                        () => this.sendEmbeddingRequest(batch, options),
                        { logPrefix, signal: options?.signal }
                    );
                    if (embeddings.length !== batch.length) {
                        throw new Error(
                            `${logPrefix} returned ${embeddings.length} vectors for ${batch.length} inputs.`
                        );
                    }
                    return { idx, embeddings };
                })
            )
        );

        return results.sort((a, b) => a.idx - b.idx).flatMap((entry) => entry.embeddings);
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        if (!embedding) {
            throw new Error(`${this.config.provider}:embed returned no vector for the query.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export abstract class BaseChatProvider implements ChatProvider {
    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.scheduler = new ProviderScheduler(
            Math.max(1, limits.concurrency ?? 5),
            limits.retries ?? 5,
            limits,
            logger
        );
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        const tokens = countTokens(prompt, this.config.model) + (options.maxTokens ?? this.config.maxOutputTokens ?? 1_000);
        return this.scheduler.schedule(tokens, () => this.complete(prompt, options), {
            logPrefix: `${this.config.provider}:chat`,
            signal: options.signal,
        });
    }

    protected abstract complete(prompt: string, options: GenerateOptions): Promise<string>;
}
