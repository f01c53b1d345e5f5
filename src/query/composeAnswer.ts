import { GenerationUnavailableError, InvalidConfigurationError, describeError } from "../errors";
import { buildAnswerPrompt, formatContextBlock } from "../llm/prompt";
import type { GenerateFn } from "../llm/types";
import type { RetrievalResult } from "../store/types";

export interface ComposeOptions {
    maxContextChunks: number;
}

export async function composeAnswer(
    question: string,
    retrievalResult: RetrievalResult,
    generate: GenerateFn,
    { maxContextChunks }: ComposeOptions
): Promise<string> {
    if (!Number.isInteger(maxContextChunks) || maxContextChunks <= 0) {
        throw new InvalidConfigurationError(`maxContextChunks must be a positive integer, got ${maxContextChunks}.`);
    }

    // An empty context still goes to the generator so it can say the answer is missing.
    const contextBlock = formatContextBlock(retrievalResult.slice(0, maxContextChunks));
    const prompt = buildAnswerPrompt(question, contextBlock);

    try {
        return await generate(prompt);
    } catch (error) {
        if (error instanceof GenerationUnavailableError) {
            throw error;
        }
        throw new GenerationUnavailableError(describeError(error), error);
    }
}
