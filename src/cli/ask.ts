#!/usr/bin/env node
import fs from "node:fs/promises";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { indexDocuments } from "../ingest/pipeline";
import { loadTextDocuments } from "../ingest/textFiles";
import { createLLMClient } from "../llm/factory";
import { askAi } from "../query/askAi";
import { EmbeddingIndex } from "../store/embeddingIndex";
import { loadIndexSnapshot, saveIndexSnapshot } from "../store/snapshotFile";
import { configureLogger, getLogger } from "../utils/logger";
import { createTiktokenTokenizer } from "../utils/tokenEncoder";
import { CliUsageError, HELP, parseArgs, planIndexSource } from "./args";

async function fileExists(filePath: string): Promise<boolean> {
    return fs.access(filePath).then(() => true, () => false);
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        console.log(HELP);
        return;
    }

    const source = planIndexSource(options, options.indexPath ? await fileExists(options.indexPath) : false);

    const config = loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);
    logger.info(`Loaded configuration from ${options.configPath ?? resolveConfigPath()}`);

    const llm = createLLMClient(config.llm, logger);

    let index: EmbeddingIndex;
    if (source.kind === "snapshot") {
        index = await loadIndexSnapshot(source.path);
        logger.info({ size: index.size, dimension: index.dimension }, `Loaded index snapshot from ${source.path}`);
    } else {
        index = new EmbeddingIndex();
        const documents = await loadTextDocuments(source.files);
        await indexDocuments(documents, index, llm.embedding, {
            chunkSize: config.chunking.chunkSize,
            overlap: config.chunking.overlap,
            tokenizer: createTiktokenTokenizer(config.chunking.tokenizerModel),
        }, logger);

        if (source.savePath) {
            await saveIndexSnapshot(source.savePath, index);
            logger.info(`Saved index snapshot to ${source.savePath}`);
        }
    }

    const result = await askAi(llm, index, {
        question: options.question,
        topK: config.retrieval.topK,
        maxContextChunks: config.retrieval.maxContextChunks,
    }, logger);

    console.log(result.answer);
    if (result.sources.length > 0) {
        console.log("\nSources:");
        for (const source of result.sources) {
            console.log(`  ${source.documentId}#${source.chunkIndex} (${source.score.toFixed(3)})`);
        }
    }
}

main().catch((error) => {
    if (error instanceof CliUsageError) {
        console.error(`${error.message}\n\n${HELP}`);
    } else {
        getLogger().error({ err: error }, "ragcore-ask failed.");
    }
    process.exitCode = 1;
});
