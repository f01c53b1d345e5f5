import fs from "node:fs/promises";
import path from "node:path";
import { createDocument } from "./chunker";
import type { Document } from "./types";

export async function loadTextDocuments(filePaths: string[], cwd = process.cwd()): Promise<Document[]> {
    return Promise.all(
        filePaths.map(async (filePath) => {
            const absolutePath = path.resolve(cwd, filePath);
            const text = await fs.readFile(absolutePath, "utf8");
            const id = path.relative(cwd, absolutePath).split(path.sep).join("/");
            return createDocument(id, text, {
                source: absolutePath,
                bytes: Buffer.byteLength(text, "utf8"),
            });
        })
    );
}
