import { resolveConfigPath } from "../config/loadConfig";
import { RagError } from "../errors";

export interface CliOptions {
    /** Only set when `--config` was given; otherwise the default lookup applies. */
    configPath?: string;
    indexPath?: string;
    files: string[];
    question: string;
}

export class CliUsageError extends RagError {
    constructor(message: string) {
        super(message);
        this.name = "CliUsageError";
    }
}

export const HELP = [
    "Usage: ragcore-ask [--config <path-to-env>] [--index <snapshot.json>] --file <path> [--file <path> ...] <question>",
    "",
    "Options:",
    "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
    "  -i, --index    Index snapshot to load if present, or to write after indexing.",
    "  -f, --file     Text file to index. Repeatable.",
    "  -h, --help     Show this help message.",
].join("\n");

/** Returns `null` when help was requested. */
export function parseArgs(argv: string[]): CliOptions | null {
    let configPath: string | undefined;
    let indexPath: string | undefined;
    const files: string[] = [];
    const words: string[] = [];

    const valueOf = (flag: string, value: string | undefined): string => {
        if (!value || value.startsWith("-")) {
            throw new CliUsageError(`Option ${flag} expects a value.`);
        }
        return value;
    };

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                return null;
            case "-c":
            case "--config":
                configPath = valueOf(arg, argv[i + 1]);
                i += 1;
                break;
            case "-i":
            case "--index":
                indexPath = valueOf(arg, argv[i + 1]);
                i += 1;
                break;
            case "-f":
            case "--file":
                files.push(valueOf(arg, argv[i + 1]));
                i += 1;
                break;
            default:
                words.push(arg);
        }
    }

    const question = words.join(" ").trim();
    if (!question) {
        throw new CliUsageError("A question is required.");
    }
    if (files.length === 0 && !indexPath) {
        throw new CliUsageError("Pass at least one --file, or an existing --index snapshot.");
    }

    return {
        configPath: configPath ? resolveConfigPath(configPath) : undefined,
        indexPath,
        files,
        question,
    };
}

export type IndexSource =
    | { kind: "snapshot"; path: string }
    | { kind: "files"; files: string[]; savePath?: string };

export function planIndexSource(options: CliOptions, snapshotExists: boolean): IndexSource {
    if (options.indexPath && snapshotExists) {
        return { kind: "snapshot", path: options.indexPath };
    }
    if (options.files.length === 0) {
        throw new CliUsageError(`Index snapshot "${options.indexPath ?? ""}" does not exist; pass --file to build it.`);
    }
    return { kind: "files", files: options.files, savePath: options.indexPath };
}
