import { describe, it, expect } from "vitest";
import { CliUsageError, parseArgs, planIndexSource } from "./args";
import { resolveConfigPath } from "../config/loadConfig";

describe("parseArgs", () => {
    it("collects files and joins the remaining words into the question", () => {
        expect(parseArgs(["--file", "a.txt", "-f", "b.txt", "What", "is", "alpha?"])).toEqual({
            configPath: undefined,
            indexPath: undefined,
            files: ["a.txt", "b.txt"],
            question: "What is alpha?",
        });
    });

    it("accepts an index snapshot instead of files", () => {
        const options = parseArgs(["--index", "cache/index.json", "--config", "custom.env", "Why?"]);

        expect(options?.indexPath).toBe("cache/index.json");
        expect(options?.configPath).toBe(resolveConfigPath("custom.env"));
        expect(options?.files).toEqual([]);
    });

    it("returns null for --help", () => {
        expect(parseArgs(["--file", "a.txt", "-h"])).toBeNull();
    });

    it.each([
        [["--file", "a.txt"], "A question is required."],
        [["What?"], "Pass at least one --file, or an existing --index snapshot."],
        [["--file", "--index", "x.json", "What?"], "Option --file expects a value."],
        [["What?", "--config"], "Option --config expects a value."],
    ])("rejects %j", (argv, message) => {
        expect(() => parseArgs(argv)).toThrow(new CliUsageError(message));
    });
});

describe("planIndexSource", () => {
    const base = { question: "Why?" };

    it("loads an existing snapshot even when files are given", () => {
        expect(planIndexSource({ ...base, indexPath: "index.json", files: ["a.txt"] }, true)).toEqual({
            kind: "snapshot",
            path: "index.json",
        });
    });

    it("indexes the files and saves to a missing snapshot path", () => {
        expect(planIndexSource({ ...base, indexPath: "index.json", files: ["a.txt"] }, false)).toEqual({
            kind: "files",
            files: ["a.txt"],
            savePath: "index.json",
        });
    });

    it("rejects a missing snapshot with no files to build it from", () => {
        expect(() => planIndexSource({ ...base, indexPath: "missing.json", files: [] }, false)).toThrow(
            new CliUsageError('Index snapshot "missing.json" does not exist; pass --file to build it.')
        );
    });
});
