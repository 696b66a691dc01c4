import { AppError, errorMessage } from "../utils/errors";
import { Logger, logErrorWithContext, silentLogger } from "../utils/logger";
import type { FileRouter } from "./fileRouter";
import type { ResolutionWorkflow } from "./resolution/resolutionWorkflow";
import type { ResolutionPolicy, Song } from "./resolution/types";

export type FileStatus = "accepted" | "corrected" | "skipped" | "failed";

export interface FileOutcome {
    file: string;
    status: FileStatus;
    song?: Song;
    destination?: string;
    submitted?: boolean;
    error?: string;
    errorCode?: string;
}

export interface BatchSummary {
    outcomes: FileOutcome[];
    counts: Record<FileStatus, number>;
}

/**
 * Resolves and places files one at a time. A failure in one file is
 * logged and recorded; the rest of the batch still runs.
 */
export class BatchProcessor {
    constructor(
        private readonly workflow: ResolutionWorkflow,
        private readonly router: FileRouter,
        private readonly logger: Logger = silentLogger
    ) {}

    async processFile(file: string, policy: ResolutionPolicy): Promise<FileOutcome> {
        this.logger.info(`Start processing file: ${file}`);

        const outcome = await this.workflow.resolveFile(file, policy);

        if (outcome.state === "SKIPPED") {
            const destination = await this.router.placeSkipped(file);
            return { file, status: "skipped", destination };
        }

        const destination = await this.router.placeResolved(file, outcome.song);
        this.logger.info(`Wrote result to file: ${destination}`);

        if (outcome.state === "AUTO_ACCEPTED") {
            return { file, status: "accepted", song: outcome.song, destination };
        }
        return {
            file,
            status: "corrected",
            song: outcome.song,
            destination,
            submitted: outcome.submitted,
        };
    }

    async processFiles(files: readonly string[], policy: ResolutionPolicy): Promise<BatchSummary> {
        const outcomes: FileOutcome[] = [];
        const counts: Record<FileStatus, number> = {
            accepted: 0,
            corrected: 0,
            skipped: 0,
            failed: 0,
        };

        for (const file of files) {
            let outcome: FileOutcome;
            try {
                outcome = await this.processFile(file, policy);
            } catch (error) {
                logErrorWithContext(this.logger, `Failed to process ${file}`, error, {
                    file,
                });
                outcome = {
                    file,
                    status: "failed",
                    error: errorMessage(error),
                    errorCode: error instanceof AppError ? error.code : undefined,
                };
            }
            outcomes.push(outcome);
            counts[outcome.status]++;
        }

        return { outcomes, counts };
    }
}
