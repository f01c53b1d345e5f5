import { get_encoding, encoding_for_model, Tiktoken, type TiktokenModel } from "tiktoken";
import type { Tokenizer } from "../ingest/types";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

// Literal special tokens such as "<|endoftext|>" are encoded as ordinary text.
const NO_SPECIAL_TOKENS: string[] = [];

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function encodeText(text: string, model?: string): Uint32Array {
    return getEncoder(model).encode(text, NO_SPECIAL_TOKENS, NO_SPECIAL_TOKENS);
}

export function countTokens(chunk: string, model?: string): number {
    if (!chunk) return 0;
    return encodeText(chunk, model).length;
}

export function countTokensInBatch(chunks: string[], model?: string): number {
    return chunks.reduce((sum, current) => sum + countTokens(current, model), 0);
}

function utf8Width(codePoint: number): number {
    if (codePoint < 0x80) return 1;
    if (codePoint < 0x800) return 2;
    if (codePoint < 0x10000) return 3;
    return 4;
}

interface EncodedText {
    tokens: Uint32Array;
    /** Byte offset where each token starts, plus the total byte length. */
    tokenBytes: number[];
    /** String index of the character that owns each byte, plus `text.length`. */
    charAtByte: number[];
}

function encodeWithOffsets(text: string, model?: string): EncodedText {
    const encoder = getEncoder(model);
    const tokens = text ? encodeText(text, model) : new Uint32Array(0);

    const tokenBytes = [0];
    for (let i = 0; i < tokens.length; i++) {
        tokenBytes.push(tokenBytes[i] + encoder.decode(tokens.subarray(i, i + 1)).length);
    }

    const charAtByte: number[] = [];
    let charIndex = 0;
    for (const char of text) {
        const width = utf8Width(char.codePointAt(0) ?? 0);
        for (let b = 0; b < width; b++) charAtByte.push(charIndex);
        charIndex += char.length;
    }
    charAtByte.push(text.length);

    return { tokens, tokenBytes, charAtByte };
}

/**
 * Token windows are mapped back onto the original string. A token edge that
 * falls inside a multi-byte character moves to the start of that character,
 * so adjacent windows still meet exactly and no text is re-decoded.
 */
export function createTiktokenTokenizer(model?: string): Tokenizer {
    let lastText: string | undefined;
    let last: EncodedText = encodeWithOffsets("", model);

    const encoded = (text: string): EncodedText => {
        if (text !== lastText) {
            last = encodeWithOffsets(text, model);
            lastText = text;
        }
        return last;
    };

    const charOffset = ({ tokenBytes, charAtByte }: EncodedText, token: number): number => {
        const byte = tokenBytes[Math.min(Math.max(token, 0), tokenBytes.length - 1)];
        return charAtByte[Math.min(byte, charAtByte.length - 1)];
    };

    return {
        countTokens: (text) => encoded(text).tokens.length,
        sliceTokens: (text, start, end) => {
            const current = encoded(text);
            if (end <= start) {
                return "";
            }
            return text.slice(charOffset(current, start), charOffset(current, end));
        },
    };
}
