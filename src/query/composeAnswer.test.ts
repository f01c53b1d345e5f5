import { describe, it, expect, vi } from "vitest";
import { composeAnswer } from "./composeAnswer";
import { buildAnswerPrompt, formatContextBlock, NOT_IN_CONTEXT_INSTRUCTION } from "../llm/prompt";
import { GenerationUnavailableError, InvalidConfigurationError } from "../errors";
import type { RetrievalResult } from "../store/types";
import { makeChunk } from "../test-helpers/fixtures";

const ranked: RetrievalResult = [
    { chunk: makeChunk("guide:0", "Alpha paragraph.", "guide", 0), score: 0.9 },
    { chunk: makeChunk("guide:3", "Beta paragraph.\n\nWith a blank line.", "guide", 3), score: 0.7 },
    { chunk: makeChunk("faq:1", "Gamma paragraph.", "faq", 1), score: 0.2 },
];

const emptyContextEcho = async (prompt: string): Promise<string> =>
    prompt.includes("Context:\n\n\nQuestion:") ? "not present" : "answered from context";

describe("formatContextBlock", () => {
    it("labels each chunk and separates entries with a blank line", () => {
        expect(formatContextBlock(ranked.slice(0, 2))).toBe(
            [
                "[Source 1] guide#0",
                "Alpha paragraph.",
                "",
                "[Source 2] guide#3",
                "Beta paragraph.\n\nWith a blank line.",
            ].join("\n")
        );
    });
});

describe("buildAnswerPrompt", () => {
    it("fills the fixed template", () => {
        const prompt = buildAnswerPrompt("  What is alpha?  ", "[Source 1] guide#0\nAlpha paragraph.");

        expect(prompt).toContain(NOT_IN_CONTEXT_INSTRUCTION);
        expect(prompt.endsWith(
            "Context:\n[Source 1] guide#0\nAlpha paragraph.\n\nQuestion: What is alpha?\nAnswer:"
        )).toBe(true);
    });
});

describe("composeAnswer", () => {
    it("sends at most maxContextChunks chunks in ranked order", async () => {
        const generate = vi.fn(async (_prompt: string) => "answer");

        await composeAnswer("What?", ranked, generate, { maxContextChunks: 2 });

        expect(generate).toHaveBeenCalledWith(buildAnswerPrompt("What?", formatContextBlock(ranked.slice(0, 2))));
        expect(generate.mock.calls[0][0]).not.toContain("faq#1");
    });

    it("returns the generator output verbatim", async () => {
        const answer = await composeAnswer("What?", ranked, async () => "  spaced answer \n", {
            maxContextChunks: 3,
        });
        expect(answer).toBe("  spaced answer \n");
    });

    it("still calls the generator with an empty context", async () => {
        const generate = vi.fn(emptyContextEcho);

        const answer = await composeAnswer("Where is delta?", [], generate, { maxContextChunks: 3 });

        expect(answer).toBe("not present");
        expect(generate).toHaveBeenCalledTimes(1);
    });

    it("passes context to the same generator when chunks exist", async () => {
        const answer = await composeAnswer("What?", ranked, emptyContextEcho, { maxContextChunks: 1 });
        expect(answer).toBe("answered from context");
    });

    it("wraps generator failures", async () => {
        const failure = new Error("timeout");

        const rejection = await composeAnswer("What?", ranked, async () => {
            throw failure;
        }, { maxContextChunks: 1 }).catch((error: unknown) => error);

        expect(rejection).toBeInstanceOf(GenerationUnavailableError);
        expect(rejection).toMatchObject({ cause: failure });
    });

    it.each([0, -2, 1.5])("rejects maxContextChunks = %s", async (maxContextChunks) => {
        const generate = vi.fn(async (_prompt: string) => "answer");

        await expect(composeAnswer("What?", ranked, generate, { maxContextChunks })).rejects.toBeInstanceOf(
            InvalidConfigurationError
        );
        expect(generate).not.toHaveBeenCalled();
    });
});
