import fs from "node:fs/promises";
import path from "node:path";
import { RagError } from "../errors";
import { EmbeddingIndex } from "./embeddingIndex";

export async function saveIndexSnapshot(filePath: string, index: EmbeddingIndex): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(index.toSnapshot()), "utf8");
}

export async function loadIndexSnapshot(filePath: string): Promise<EmbeddingIndex> {
    const raw = await fs.readFile(filePath, "utf8");
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new RagError(`Index snapshot at "${filePath}" is not valid JSON.`, error);
    }
    return EmbeddingIndex.fromSnapshot(parsed);
}
