import {
    candidateLabel,
    FilenameScorer,
    scoreFilename,
} from "./filenameScorer";
import { selectRelease } from "./releaseClassifier";
import {
    createSong,
    EMPTY_SONG,
    LookupResult,
    Match,
    Recording,
    ReleaseTier,
} from "./types";

/**
 * Zero-value candidate, always considered first. Never passes the
 * confidence gate.
 */
export const SENTINEL_MATCH: Match = {
    song: EMPTY_SONG,
    score: { audio: 0, file: 0, release: ReleaseTier.NONE },
};

export function rankingKey(match: Match): number {
    return match.score.file * 1000 + match.score.release;
}

export function buildMatch(
    audioScore: number,
    recording: Recording,
    filename: string,
    scorer: FilenameScorer = scoreFilename
): Match {
    const release = selectRelease(recording.releases, recording.title);
    return {
        song: createSong(recording.artist, recording.title, release.title),
        score: {
            audio: audioScore,
            file: scorer(filename, candidateLabel(recording.artist, recording.title)),
            release: release.tier,
        },
    };
}

export function buildCandidates(
    results: readonly LookupResult[],
    filename: string,
    scorer: FilenameScorer = scoreFilename
): Match[] {
    const candidates: Match[] = [SENTINEL_MATCH];
    for (const result of results) {
        for (const recording of result.recordings) {
            candidates.push(buildMatch(result.audioScore, recording, filename, scorer));
        }
    }
    return candidates;
}

/**
 * Picks the candidate with the highest `file * 1000 + tier`; the audio
 * score takes no part. Equal keys resolve to the earliest candidate in
 * response order.
 */
export function selectBestMatch(
    results: readonly LookupResult[],
    filename: string,
    scorer: FilenameScorer = scoreFilename
): Match {
    let best = SENTINEL_MATCH;
    let bestKey = rankingKey(best);

    for (const candidate of buildCandidates(results, filename, scorer)) {
        const key = rankingKey(candidate);
        if (key > bestKey) {
            best = candidate;
            bestKey = key;
        }
    }

    return best;
}
