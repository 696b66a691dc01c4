import * as path from "path";
import * as fuzz from "fuzzball";

export type FilenameScorer = (filename: string, candidate: string) => number;

/**
 * Base name without directory or extension, e.g.
 * `"/downloads/Artist - Song.mp3"` → `"Artist - Song"`.
 */
export function filenameStem(filePath: string): string {
    return path.parse(filePath).name;
}

export function candidateLabel(artist: string, title: string): string {
    return `${artist} - ${title}`;
}

/**
 * Token-set similarity in [0,100]. Word order, duplicates and extra tokens
 * on either side ("(Official Video)", missing featured credits) do not
 * lower the score; different titles do.
 */
export const scoreFilename: FilenameScorer = (filename, candidate) => {
    const ratio = fuzz.token_set_ratio(filename, candidate);
    return Math.min(100, Math.max(0, Math.round(ratio)));
};
