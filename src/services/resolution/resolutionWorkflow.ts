import * as fs from "fs/promises";
import * as path from "path";
import { AppError, ErrorCategory, ErrorCode, wrapNodeError } from "../../utils/errors";
import { Logger, logErrorWithContext, silentLogger } from "../../utils/logger";
import type { FingerprintLookup } from "../acoustid";
import type { Fingerprinter } from "../fingerprint";
import { extractCandidates } from "./candidateExtractor";
import { DEFAULT_CONFIDENCE_THRESHOLDS, isConfident } from "./confidenceGate";
import { FilenameScorer, filenameStem, scoreFilename } from "./filenameScorer";
import { selectBestMatch } from "./matchSelector";
import {
    ConfidenceThresholds,
    CorrectionPrompter,
    CorrectionResponse,
    createSong,
    Match,
    ReleaseTierScheme,
    ResolutionPolicy,
    Song,
} from "./types";

interface ResolutionStep {
    match: Match;
    confident: boolean;
}

export interface LookedUp extends ResolutionStep {
    state: "LOOKED_UP";
}

export interface AutoAccepted extends ResolutionStep {
    state: "AUTO_ACCEPTED";
    song: Song;
}

export interface NeedsReview extends ResolutionStep {
    state: "NEEDS_REVIEW";
}

export interface Skipped extends ResolutionStep {
    state: "SKIPPED";
}

export interface ManuallyCorrected extends ResolutionStep {
    state: "MANUALLY_CORRECTED";
    song: Song;
    submitted: boolean;
}

export type ResolutionOutcome = AutoAccepted | Skipped | ManuallyCorrected;

export interface ResolutionWorkflowOptions {
    fingerprinter: Fingerprinter;
    lookup: FingerprintLookup;
    prompter: CorrectionPrompter;
    thresholds?: ConfidenceThresholds;
    tierScheme?: ReleaseTierScheme;
    scorer?: FilenameScorer;
    logger?: Logger;
}

/**
 * Applies a reviewer's overrides; blank or missing fields keep the
 * current value.
 */
export function applyCorrection(song: Song, response: CorrectionResponse): Song {
    if (!response) {
        return song;
    }
    const pick = (override: string | undefined, current: string) =>
        override && override.trim() ? override.trim() : current;
    return createSong(
        pick(response.artist, song.artist),
        pick(response.title, song.title),
        pick(response.album, song.album)
    );
}

export function fileFormat(filePath: string): string {
    return path.extname(filePath).replace(/^\./, "").toUpperCase();
}

/**
 * Per-file state machine:
 * LOOKED_UP → AUTO_ACCEPTED | NEEDS_REVIEW, NEEDS_REVIEW → SKIPPED | MANUALLY_CORRECTED.
 */
export class ResolutionWorkflow {
    private readonly thresholds: ConfidenceThresholds;
    private readonly tierScheme: ReleaseTierScheme;
    private readonly scorer: FilenameScorer;
    private readonly logger: Logger;

    constructor(private readonly options: ResolutionWorkflowOptions) {
        this.thresholds = options.thresholds ?? DEFAULT_CONFIDENCE_THRESHOLDS;
        this.tierScheme = options.tierScheme ?? "extended";
        this.scorer = options.scorer ?? scoreFilename;
        this.logger = options.logger ?? silentLogger;
    }

    /** Pure: lookup response + filename stem → best match and gate verdict. */
    evaluate(response: unknown, filename: string): LookedUp {
        const results = extractCandidates(response, this.tierScheme);
        const match = selectBestMatch(results, filename, this.scorer);
        return {
            state: "LOOKED_UP",
            match,
            confident: isConfident(match, this.thresholds),
        };
    }

    decide(lookedUp: LookedUp, policy: ResolutionPolicy): AutoAccepted | NeedsReview {
        const { match, confident } = lookedUp;
        if (confident && !policy.forceManual) {
            return { state: "AUTO_ACCEPTED", match, confident, song: match.song };
        }
        return { state: "NEEDS_REVIEW", match, confident };
    }

    async review(
        filePath: string,
        pending: NeedsReview,
        policy: ResolutionPolicy
    ): Promise<Skipped | ManuallyCorrected> {
        const { match, confident } = pending;
        if (policy.skipUnconfident) {
            return { state: "SKIPPED", match, confident };
        }

        const response = await this.options.prompter.review({
            filename: path.basename(filePath),
            song: match.song,
        });
        const song = applyCorrection(match.song, response);
        this.logger.debug("Using reviewed song attributes", { filePath, song });

        const submitted = response?.submit
            ? await this.submitCorrection(filePath, song)
            : false;

        return { state: "MANUALLY_CORRECTED", match, confident, song, submitted };
    }

    async resolveFile(filePath: string, policy: ResolutionPolicy): Promise<ResolutionOutcome> {
        await this.assertReadableFile(filePath);

        const fingerprint = await this.options.fingerprinter.fingerprint(filePath);
        const response = await this.options.lookup.lookup(fingerprint);

        const lookedUp = this.evaluate(response, filenameStem(filePath));
        this.logger.debug("Fingerprint lookup finished", {
            filePath,
            song: lookedUp.match.song,
            score: lookedUp.match.score,
            confident: lookedUp.confident,
        });

        const decided = this.decide(lookedUp, policy);
        if (decided.state === "AUTO_ACCEPTED") {
            return decided;
        }

        this.logger.debug("Low confidence for the fingerprinting result", { filePath });
        return this.review(filePath, decided, policy);
    }

    /**
     * Sends the corrected identification back to the lookup service. This
     * never changes the outcome of the current file: failures are logged.
     */
    private async submitCorrection(filePath: string, song: Song): Promise<boolean> {
        try {
            const fingerprint = await this.options.fingerprinter.fingerprint(filePath);
            return await this.options.lookup.submit({
                duration: fingerprint.duration,
                fingerprint: fingerprint.fingerprint,
                artist: song.artist,
                track: song.title,
                album: song.album,
                albumartist: song.artist,
                fileformat: fileFormat(filePath),
            });
        } catch (error) {
            logErrorWithContext(this.logger, "Correction submission failed", error, {
                filePath,
            });
            return false;
        }
    }

    private async assertReadableFile(filePath: string): Promise<void> {
        let isFile: boolean;
        try {
            isFile = (await fs.stat(filePath)).isFile();
        } catch (error) {
            throw wrapNodeError(error, filePath);
        }
        if (!isFile) {
            throw new AppError(
                ErrorCode.FILE_NOT_FOUND,
                ErrorCategory.RECOVERABLE,
                `Not a file: ${filePath}`,
                { filePath }
            );
        }
    }
}
