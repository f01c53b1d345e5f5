import { describe, it, expect, vi } from "vitest";
import { retrieve } from "./retriever";
import { EmbeddingIndex } from "../store/embeddingIndex";
import { EmbeddingUnavailableError, InvalidConfigurationError } from "../errors";
import { embedded } from "../test-helpers/fixtures";

function buildIndex(): EmbeddingIndex {
    const index = new EmbeddingIndex();
    index.insert([
        embedded("first", [1, 0], 0),
        embedded("second", [0, 1], 1),
        embedded("third", [0.9, 0.1], 2),
    ]);
    return index;
}

describe("retrieve", () => {
    it("embeds the query once and ranks the index against it", async () => {
        const embed = vi.fn(async (_text: string) => [1, 0]);

        const result = await retrieve(buildIndex(), { text: "which one?", k: 2 }, embed);

        expect(embed).toHaveBeenCalledTimes(1);
        expect(embed).toHaveBeenCalledWith("which one?");
        expect(result.map((r) => r.chunk.id)).toEqual(["first", "third"]);
    });

    it("returns an empty result from an empty index", async () => {
        const result = await retrieve(new EmbeddingIndex(), { text: "q", k: 3 }, async () => [1, 0]);
        expect(result).toEqual([]);
    });

    it("validates k before calling the embedder", async () => {
        const embed = vi.fn(async (_text: string) => [1, 0]);

        await expect(retrieve(buildIndex(), { text: "q", k: 0 }, embed)).rejects.toBeInstanceOf(
            InvalidConfigurationError
        );
        expect(embed).not.toHaveBeenCalled();
    });

    it("wraps embedder failures without retrying", async () => {
        const failure = new Error("service down");
        const embed = vi.fn(async (_text: string): Promise<number[]> => {
            throw failure;
        });

        const rejection = await retrieve(buildIndex(), { text: "q", k: 1 }, embed).catch((error: unknown) => error);

        expect(rejection).toBeInstanceOf(EmbeddingUnavailableError);
        expect(rejection).toMatchObject({ message: "Embedding unavailable: service down", cause: failure });
        expect(embed).toHaveBeenCalledTimes(1);
    });

    it("rethrows an EmbeddingUnavailableError as is", async () => {
        const failure = new EmbeddingUnavailableError("quota exceeded");

        await expect(
            retrieve(buildIndex(), { text: "q", k: 1 }, async () => {
                throw failure;
            })
        ).rejects.toBe(failure);
    });
});
