import { describe, it, expect, vi } from "vitest";
import { indexDocuments } from "./pipeline";
import { createDocument } from "./chunker";
import { EmbeddingIndex } from "../store/embeddingIndex";
import { EmbeddingUnavailableError, RagError } from "../errors";
import { numberedWords, silentLogger, wordTokenizer } from "../test-helpers/fixtures";

const options = { chunkSize: 4, overlap: 2, tokenizer: wordTokenizer };

function wordCountEmbedder() {
    return {
        embedDocuments: vi.fn(async (texts: string[]) => texts.map((text) => [text.split(" ").length, 1])),
    };
}

describe("indexDocuments", () => {
    it("chunks, embeds and inserts every document", async () => {
        const index = new EmbeddingIndex();
        const embedding = wordCountEmbedder();
        const documents = [
            createDocument("long", numberedWords(10)),
            createDocument("blank", ""),
            createDocument("short", "just three words"),
        ];

        const stats = await indexDocuments(documents, index, embedding, options, silentLogger);

        expect(stats).toEqual({ processedDocuments: 2, skippedDocuments: 1, insertedChunks: 5 });
        expect(index.size).toBe(5);
        expect(index.get("long:3")?.text).toBe("w6 w7 w8 w9");
        expect(index.get("short:0")?.vector).toEqual([3, 1]);
        expect(embedding.embedDocuments).toHaveBeenCalledTimes(2);
        expect(embedding.embedDocuments).toHaveBeenLastCalledWith(["just three words"]);
    });

    it("keeps earlier documents and drops the failing one when embedding fails", async () => {
        const index = new EmbeddingIndex();
        const failure = new Error("rate limited");
        const embedding = {
            embedDocuments: vi
                .fn<(texts: string[]) => Promise<number[][]>>()
                .mockResolvedValueOnce([[1, 0]])
                .mockRejectedValueOnce(failure),
        };
        const documents = [createDocument("ok", "tiny"), createDocument("bad", numberedWords(6))];

        const rejection = await indexDocuments(documents, index, embedding, options, silentLogger).catch(
            (error: unknown) => error
        );

        expect(rejection).toBeInstanceOf(EmbeddingUnavailableError);
        expect(rejection).toMatchObject({ cause: failure });
        expect(index.size).toBe(1);
        expect(index.has("ok:0")).toBe(true);
        expect(index.has("bad:0")).toBe(false);
    });

    it("fails when the embedder returns the wrong number of vectors", async () => {
        const index = new EmbeddingIndex();
        const embedding = { embedDocuments: async () => [[1, 0]] };

        await expect(
            indexDocuments([createDocument("doc", numberedWords(10))], index, embedding, options, silentLogger)
        ).rejects.toBeInstanceOf(RagError);
        expect(index.size).toBe(0);
    });
});
