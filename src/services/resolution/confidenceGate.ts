import { compareReleaseTiers } from "./releaseClassifier";
import { ConfidenceThresholds, Match, ReleaseTier } from "./types";

export const DEFAULT_CONFIDENCE_THRESHOLDS: ConfidenceThresholds = {
    minAudioScore: 0.4,
    minFileScore: 70,
    minReleaseTier: ReleaseTier.SINGLE,
};

/**
 * All three thresholds must hold. A perfect filename match on a recording
 * without a classifiable release is still unconfident.
 */
export function isConfident(
    match: Match,
    thresholds: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS
): boolean {
    return (
        match.score.audio >= thresholds.minAudioScore &&
        match.score.file >= thresholds.minFileScore &&
        compareReleaseTiers(match.score.release, thresholds.minReleaseTier) >= 0
    );
}
