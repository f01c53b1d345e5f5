import { afterEach, beforeEach, describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadTextDocuments } from "./textFiles";

let dir: string;

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ragcore-docs-"));
    await fs.mkdir(path.join(dir, "notes"));
    await fs.writeFile(path.join(dir, "notes", "intro.txt"), "Héllo world", "utf8");
});

afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
});

describe("loadTextDocuments", () => {
    it("reads files as documents keyed by their relative path", async () => {
        const [document] = await loadTextDocuments(["notes/intro.txt"], dir);

        expect(document.id).toBe("notes/intro.txt");
        expect(document.text).toBe("Héllo world");
        expect(document.metadata).toEqual({
            source: path.join(dir, "notes", "intro.txt"),
            bytes: 12,
        });
    });

    it("rejects when a file is missing", async () => {
        await expect(loadTextDocuments(["missing.txt"], dir)).rejects.toMatchObject({ code: "ENOENT" });
    });
});
