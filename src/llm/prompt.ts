import type { ScoredChunk } from "../store/types";

export const NOT_IN_CONTEXT_INSTRUCTION =
    "If the answer cannot be determined from the context, reply that the answer is not present in the provided context.";

const INSTRUCTIONS = [
    "You are a meticulous assistant that answers questions using the provided context.",
    "Use only the supplied context to craft your answer.",
    NOT_IN_CONTEXT_INSTRUCTION,
].join(" ");

export function formatSourceHeader(position: number, scored: ScoredChunk): string {
    return `[Source ${position}] ${scored.chunk.documentId}#${scored.chunk.index}`;
}

/** Each entry starts with its `[Source n]` header; entries are separated by a blank line. */
export function formatContextBlock(chunks: readonly ScoredChunk[]): string {
    return chunks
        .map((scored, index) => `${formatSourceHeader(index + 1, scored)}\n${scored.chunk.text.trim()}`)
        .join("\n\n");
}

export function buildAnswerPrompt(question: string, contextBlock: string): string {
    return [
        INSTRUCTIONS,
        "",
        "Context:",
        contextBlock,
        "",
        `Question: ${question.trim()}`,
        "Answer:",
    ].join("\n");
}
