import { InvalidConfigurationError } from "../errors";

export function batchChunks<T>(items: readonly T[], batchSize: number): T[][] {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
        throw new InvalidConfigurationError(`batchSize must be a positive integer, got ${batchSize}.`);
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
        batches.push(items.slice(i, i + batchSize));
    }
    return batches;
}
