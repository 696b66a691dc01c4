/**
 * tuneresolve <files...>
 * Fingerprint local audio files, resolve artist/title/album and place the
 * files under their resolved names.
 */

import { Command } from "commander";
import dotenv from "dotenv";
import { loadResolverConfig } from "../config";
import { AcoustidService } from "../services/acoustid";
import { BatchProcessor, BatchSummary } from "../services/batchProcessor";
import { createTerminalPrompter } from "../services/correctionPrompt";
import { FileRouter, FileRouterOptions } from "../services/fileRouter";
import { FpcalcFingerprinter } from "../services/fingerprint";
import { RateLimiter, ACOUSTID_RATE_LIMIT } from "../services/rateLimiter";
import { ResolutionWorkflow } from "../services/resolution/resolutionWorkflow";
import type { ResolutionPolicy } from "../services/resolution/types";
import { createLogger, logLevelForVerbosity } from "../utils/logger";

export interface ResolveCommandOptions {
    outputDirectory: string;
    skipDirectory: string;
    keep?: boolean;
    skip?: boolean;
    manual?: boolean;
    verbose: number;
}

export type ResolveRunner = (
    files: string[],
    options: ResolveCommandOptions
) => Promise<number>;

export function policyFromOptions(options: ResolveCommandOptions): ResolutionPolicy {
    return {
        forceManual: Boolean(options.manual),
        skipUnconfident: Boolean(options.skip),
    };
}

export function routerOptionsFromCli(options: ResolveCommandOptions): FileRouterOptions {
    return {
        outputDirectory: options.outputDirectory,
        skipDirectory: options.skipDirectory,
        keepOriginal: Boolean(options.keep),
    };
}

export function formatSummary(summary: BatchSummary): string[] {
    const lines = summary.outcomes.map((outcome) => {
        if (outcome.status === "failed") {
            return `${outcome.file}\n--> failed: ${outcome.error ?? "unknown error"}`;
        }
        const song = outcome.song
            ? `\n--> ${outcome.song.artist} - ${outcome.song.title} [${outcome.song.album}]`
            : "";
        return `${outcome.file}${song}\n--> ${outcome.status}: ${outcome.destination ?? ""}`;
    });
    const { accepted, corrected, skipped, failed } = summary.counts;
    lines.push(
        `Done: ${accepted} accepted, ${corrected} corrected, ${skipped} skipped, ${failed} failed`
    );
    return lines;
}

export const runResolve: ResolveRunner = async (files, options) => {
    dotenv.config();
    const config = loadResolverConfig();
    const level =
        options.verbose > 0 ? logLevelForVerbosity(options.verbose) : config.logLevel;
    const logger = createLogger("tuneresolve", level);
    logger.debug("Received arguments", { files, options });

    const rateLimiter = new RateLimiter(ACOUSTID_RATE_LIMIT, logger.child("rate-limit"));
    const lookup = new AcoustidService(config.acoustid, rateLimiter, logger.child("acoustid"));
    const fingerprinter = new FpcalcFingerprinter(config.fingerprint, logger.child("fpcalc"));
    const terminal = createTerminalPrompter();

    try {
        const workflow = new ResolutionWorkflow({
            fingerprinter,
            lookup,
            prompter: terminal.prompter,
            thresholds: config.thresholds,
            tierScheme: config.tierScheme,
            logger: logger.child("workflow"),
        });
        const router = new FileRouter(routerOptionsFromCli(options), logger.child("files"));
        const processor = new BatchProcessor(workflow, router, logger);

        const summary = await processor.processFiles(files, policyFromOptions(options));
        for (const line of formatSummary(summary)) {
            console.log(line);
        }
        return summary.counts.failed > 0 ? 1 : 0;
    } finally {
        terminal.close();
    }
};

function increaseVerbosity(_value: string, previous: number): number {
    return previous + 1;
}

export function makeResolveCommand(run: ResolveRunner = runResolve): Command {
    return new Command("tuneresolve")
        .description("Identify audio files by acoustic fingerprint and rename them to Artist - Title")
        .argument("<files...>", "Local audio files to resolve")
        .option("-o, --output-directory <dir>", "Directory for resolved files", "finished")
        .option("-k, --keep", "Keep original files instead of moving them")
        .option("-s, --skip", "Hold unconfident matches aside instead of asking for corrections")
        .option("-d, --skip-directory <dir>", "Directory for skipped files (with --skip)", "skipped")
        .option("-m, --manual", "Always ask for manual corrections, even for confident matches")
        .option("-v, --verbose", "Increase verbosity (repeatable)", increaseVerbosity, 0)
        .action(async (files: string[], options: ResolveCommandOptions) => {
            process.exitCode = await run(files, options);
        });
}
