import { z } from "zod";

/**
 * Lenient schemas for the AcoustID lookup response
 * (`meta=recordings releasegroups`). Each level is parsed on its own so a
 * malformed entry only drops itself, never its siblings.
 */

export const artistCreditSchema = z.object({
    name: z.string(),
    joinphrase: z.string().optional(),
});

export type ArtistCredit = z.infer<typeof artistCreditSchema>;

export const releaseGroupSchema = z.object({
    type: z.string().optional(),
    secondarytypes: z.array(z.string()).optional(),
    title: z.string().default(""),
    artists: z.array(artistCreditSchema).optional(),
});

export type RawReleaseGroup = z.infer<typeof releaseGroupSchema>;

export const recordingSchema = z.object({
    artists: z.array(artistCreditSchema),
    title: z.string(),
    releasegroups: z.array(z.unknown()).optional(),
});

export type RawRecording = z.infer<typeof recordingSchema>;

export const resultSchema = z.object({
    score: z.number(),
    recordings: z.array(z.unknown()),
});

export type RawResult = z.infer<typeof resultSchema>;

export const lookupResponseSchema = z.object({
    status: z.string().optional(),
    results: z.array(z.unknown()).optional(),
    error: z
        .object({
            code: z.number().optional(),
            message: z.string().optional(),
        })
        .optional(),
});

export type RawLookupResponse = z.infer<typeof lookupResponseSchema>;

/**
 * Parses `value` with `schema`, returning null instead of throwing.
 */
export function parseOrNull<T extends z.ZodTypeAny>(
    schema: T,
    value: unknown
): z.output<T> | null {
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : null;
}
