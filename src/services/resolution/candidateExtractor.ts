import { joinArtistCredits } from "./artistCredit";
import {
    lookupResponseSchema,
    parseOrNull,
    recordingSchema,
    releaseGroupSchema,
    resultSchema,
} from "./lookupResponse";
import { classifyReleaseGroup } from "./releaseClassifier";
import type {
    LookupResult,
    Recording,
    Release,
    ReleaseTierScheme,
} from "./types";

function extractReleases(
    rawGroups: readonly unknown[],
    recordingArtist: string,
    scheme: ReleaseTierScheme
): Release[] {
    const releases: Release[] = [];
    for (const rawGroup of rawGroups) {
        const group = parseOrNull(releaseGroupSchema, rawGroup);
        if (!group) continue;

        const release = classifyReleaseGroup(group, recordingArtist, scheme);
        if (release) {
            releases.push(release);
        }
    }
    return releases;
}

/**
 * Parses one raw recording. Recordings the service returns without an
 * artist credit or title are dropped.
 */
export function extractRecording(
    rawRecording: unknown,
    scheme: ReleaseTierScheme
): Recording | null {
    const recording = parseOrNull(recordingSchema, rawRecording);
    if (!recording) {
        return null;
    }

    const artist = joinArtistCredits(recording.artists);
    return {
        artist,
        title: recording.title,
        releases: extractReleases(recording.releasegroups ?? [], artist, scheme),
    };
}

/**
 * Walks a raw lookup response into typed results. Missing `results`, a
 * result without `score` or `recordings`, and incomplete recordings all
 * count as "nothing usable" for their level rather than as errors.
 */
export function extractCandidates(
    response: unknown,
    scheme: ReleaseTierScheme
): LookupResult[] {
    const parsed = parseOrNull(lookupResponseSchema, response);
    if (!parsed?.results) {
        return [];
    }

    const results: LookupResult[] = [];
    for (const rawResult of parsed.results) {
        const result = parseOrNull(resultSchema, rawResult);
        if (!result) continue;

        const recordings: Recording[] = [];
        for (const rawRecording of result.recordings) {
            const recording = extractRecording(rawRecording, scheme);
            if (recording) {
                recordings.push(recording);
            }
        }

        results.push({ audioScore: result.score, recordings });
    }
    return results;
}
