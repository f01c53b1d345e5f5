import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { InvalidConfigurationError } from "../errors";
import { assertChunkingOptions } from "../ingest/chunker";
import type { AppConfig, LLMProviderName, LoggingConfig } from "./types";

const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

const LLM_PROVIDERS: readonly LLMProviderName[] = ["openai"];
const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace"];

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, required = true): string | undefined {
    const value = env[key]?.trim();
    if (required && !value) {
        throw new InvalidConfigurationError(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(env: Env, key: string): number | undefined;
function getEnvNumber(env: Env, key: string, defaultValue: number): number;
function getEnvNumber(env: Env, key: string, defaultValue?: number): number | undefined {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
        throw new InvalidConfigurationError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue = false): boolean {
    const value = env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getProvider(env: Env, key: string): LLMProviderName {
    const value = getEnv(env, key);
    const provider = LLM_PROVIDERS.find((name) => name === value);
    if (!provider) {
        throw new InvalidConfigurationError(`${key} must be one of ${LLM_PROVIDERS.join(", ")}, got: ${value}`);
    }
    return provider;
}

function getLogLevel(env: Env): LoggingConfig["level"] {
    const value = getEnv(env, "RAGCORE_LOGGING_LEVEL", false) ?? "info";
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidConfigurationError(`RAGCORE_LOGGING_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`);
    }
    return level;
}

function requirePositiveInteger(key: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidConfigurationError(`${key} must be a positive integer, got: ${value}`);
    }
    return value;
}

export function buildAppConfig(env: Env): AppConfig {
    const chunking = {
        chunkSize: getEnvNumber(env, "RAGCORE_CHUNK_SIZE", 256),
        overlap: getEnvNumber(env, "RAGCORE_CHUNK_OVERLAP", 32),
        tokenizerModel: getEnv(env, "RAGCORE_TOKENIZER_MODEL", false) ?? "cl100k_base",
    };
    assertChunkingOptions(chunking);

    return {
        logging: {
            level: getLogLevel(env),
            pretty: getEnvBoolean(env, "RAGCORE_LOGGING_PRETTY", true),
        },
        chunking,
        retrieval: {
            topK: requirePositiveInteger("RAGCORE_RETRIEVAL_TOP_K", getEnvNumber(env, "RAGCORE_RETRIEVAL_TOP_K", 4)),
            maxContextChunks: requirePositiveInteger(
                "RAGCORE_MAX_CONTEXT_CHUNKS",
                getEnvNumber(env, "RAGCORE_MAX_CONTEXT_CHUNKS", 4)
            ),
        },
        llm: {
            embedding: {
                provider: getProvider(env, "RAGCORE_LLM_EMBEDDING_PROVIDER"),
                model: getEnv(env, "RAGCORE_LLM_EMBEDDING_MODEL") ?? "",
                apiKey: getEnv(env, "RAGCORE_LLM_EMBEDDING_API_KEY", false),
                baseUrl: getEnv(env, "RAGCORE_LLM_EMBEDDING_BASE_URL", false),
                limits: {
                    batchSize: getEnvNumber(env, "RAGCORE_LLM_EMBEDDING_LIMITS_BATCH_SIZE", 100),
                    concurrency: getEnvNumber(env, "RAGCORE_LLM_EMBEDDING_LIMITS_CONCURRENCY", 4),
                    maxRequestsPerMinute: getEnvNumber(env, "RAGCORE_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE", 1500),
                    maxTokensPerMinute: getEnvNumber(env, "RAGCORE_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE", 1_000_000),
                    retries: getEnvNumber(env, "RAGCORE_LLM_EMBEDDING_LIMITS_RETRIES", 3),
                },
            },
            chat: {
                provider: getProvider(env, "RAGCORE_LLM_CHAT_PROVIDER"),
                model: getEnv(env, "RAGCORE_LLM_CHAT_MODEL") ?? "",
                apiKey: getEnv(env, "RAGCORE_LLM_CHAT_API_KEY", false),
                baseUrl: getEnv(env, "RAGCORE_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber(env, "RAGCORE_LLM_CHAT_TEMPERATURE", 0),
                maxOutputTokens: getEnvNumber(env, "RAGCORE_LLM_CHAT_MAX_OUTPUT_TOKENS"),
                limits: {
                    concurrency: getEnvNumber(env, "RAGCORE_LLM_CHAT_LIMITS_CONCURRENCY", 2),
                    maxRequestsPerMinute: getEnvNumber(env, "RAGCORE_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE", 500),
                    maxTokensPerMinute: getEnvNumber(env, "RAGCORE_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE", 90_000),
                    retries: getEnvNumber(env, "RAGCORE_LLM_CHAT_LIMITS_RETRIES", 3),
                },
            },
        },
    };
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.RAGCORE_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.RAGCORE_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export function loadAppConfig(configPath?: string): AppConfig {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    // A missing default .env is fine: the variables may already be exported.
    if (result.error && configPath) {
        throw new InvalidConfigurationError(
            `Failed to load environment file from "${configPath}": ${result.error.message}`
        );
    }

    return buildAppConfig(process.env);
}
