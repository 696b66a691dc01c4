/**
 * Domain types for fingerprint-based metadata resolution.
 *
 * Everything here is created per input file from a lookup response and
 * discarded once a final Song is produced.
 */

/** Final identification handed to tag writing. Empty strings mean unknown. */
export interface Song {
    readonly artist: string;
    readonly title: string;
    readonly album: string;
}

/**
 * Ordinal trust of a release-group, low to high. The numeric values are
 * part of the ranking key (`file * 1000 + tier`), so they must stay below 1000.
 */
export enum ReleaseTier {
    NONE = 0,
    MIX = 1,
    COMPILATION = 2,
    SINGLE = 3,
    ALBUM = 4,
}

/**
 * `extended` classifies into all five tiers; `simple` only ever yields
 * NONE, SINGLE or ALBUM. A run uses exactly one scheme.
 */
export type ReleaseTierScheme = "simple" | "extended";

export interface Release {
    title: string;
    tier: ReleaseTier;
}

export interface Recording {
    artist: string;
    title: string;
    releases: Release[];
}

/** One top-level lookup result; audioScore is the fingerprint confidence in [0,1]. */
export interface LookupResult {
    audioScore: number;
    recordings: Recording[];
}

export interface Score {
    audio: number;
    /** Filename similarity percentage in [0,100]. */
    file: number;
    release: ReleaseTier;
}

export interface Match {
    song: Song;
    score: Score;
}

export interface ConfidenceThresholds {
    minAudioScore: number;
    minFileScore: number;
    minReleaseTier: ReleaseTier;
}

export interface ResolutionPolicy {
    /** Route every file to review, even confident ones. */
    forceManual: boolean;
    /** Hold unconfident files aside instead of asking for corrections. */
    skipUnconfident: boolean;
}

export interface FingerprintResult {
    /** Seconds. */
    duration: number;
    fingerprint: string;
}

export interface CorrectionRequest {
    filename: string;
    song: Song;
}

/**
 * Answer to a review. Blank or absent overrides keep the current value;
 * `null` means the reviewer declined to adjust anything.
 */
export type CorrectionResponse = {
    artist?: string;
    title?: string;
    album?: string;
    submit: boolean;
} | null;

export interface CorrectionPrompter {
    review(request: CorrectionRequest): Promise<CorrectionResponse>;
}

export interface CorrectionSubmission {
    duration: number;
    fingerprint: string;
    artist: string;
    track: string;
    album: string;
    albumartist: string;
    fileformat: string;
}

export function createSong(artist = "", title = "", album = ""): Song {
    return Object.freeze({ artist, title, album });
}

export const EMPTY_SONG: Song = createSong();
