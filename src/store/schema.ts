import { z } from "zod";

export const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const embeddedChunkSchema = z.object({
    id: z.string().min(1),
    documentId: z.string(),
    index: z.number().int().nonnegative(),
    startToken: z.number().int().nonnegative(),
    endToken: z.number().int().nonnegative(),
    text: z.string(),
    checksum: z.string(),
    metadata: metadataSchema,
    vector: z.array(z.number()),
});

export const indexSnapshotSchema = z.object({
    version: z.literal(1),
    dimension: z.number().int().positive().nullable(),
    entries: z.array(embeddedChunkSchema),
});
