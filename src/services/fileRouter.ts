import * as fs from "fs/promises";
import * as path from "path";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    errnoCode,
    wrapNodeError,
} from "../utils/errors";
import { Logger, silentLogger } from "../utils/logger";
import type { Song } from "./resolution/types";

// "/" cannot appear in a filename; DIVIDING SLASH (U+29F8) looks the same
const PATH_SEPARATOR_STANDIN = "⧸";

export interface FileRouterOptions {
    outputDirectory: string;
    skipDirectory: string;
    keepOriginal: boolean;
}

export function resolvedFilename(song: Song, extension: string): string {
    return `${song.artist} - ${song.title}${extension}`.replace(
        /\//g,
        PATH_SEPARATOR_STANDIN
    );
}

/**
 * Places processed files: renamed into the output directory once a Song
 * is final, or untouched into the holding directory when skipped.
 */
export class FileRouter {
    constructor(
        private readonly options: FileRouterOptions,
        private readonly logger: Logger = silentLogger
    ) {}

    async placeResolved(filePath: string, song: Song): Promise<string> {
        const destination = path.join(
            this.options.outputDirectory,
            resolvedFilename(song, path.extname(filePath))
        );
        await this.transfer(filePath, destination);
        return destination;
    }

    async placeSkipped(filePath: string): Promise<string> {
        const destination = path.join(
            this.options.skipDirectory,
            path.basename(filePath)
        );
        await this.transfer(filePath, destination);
        this.logger.info(`Skipped processing of song, placed file in: ${destination}`);
        return destination;
    }

    /**
     * Copies when originals are kept, otherwise moves. Keeping a file whose
     * destination is itself is a no-op; any other existing destination is
     * left untouched and the transfer fails with DESTINATION_EXISTS.
     */
    async transfer(source: string, destination: string): Promise<void> {
        try {
            await fs.mkdir(path.dirname(destination), { recursive: true });

            if (path.resolve(source) === path.resolve(destination)) {
                if (this.options.keepOriginal) {
                    this.logger.warn(
                        `Keep-original is set but ${source} is already at its destination - leaving it in place`
                    );
                }
                return;
            }

            if (this.options.keepOriginal) {
                await fs.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
                return;
            }

            await this.move(source, destination);
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            throw wrapNodeError(error, `${source} -> ${destination}`);
        }
    }

    private async move(source: string, destination: string): Promise<void> {
        // rename replaces an existing destination silently
        await this.assertAbsent(source, destination);
        try {
            await fs.rename(source, destination);
        } catch (error) {
            if (errnoCode(error) !== "EXDEV") {
                throw error;
            }
            // rename cannot cross filesystems
            await fs.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
            await fs.unlink(source);
        }
    }

    private async assertAbsent(source: string, destination: string): Promise<void> {
        try {
            await fs.lstat(destination);
        } catch (error) {
            if (errnoCode(error) === "ENOENT") {
                return;
            }
            throw error;
        }
        throw new AppError(
            ErrorCode.DESTINATION_EXISTS,
            ErrorCategory.RECOVERABLE,
            `Destination already exists: ${source} -> ${destination}`,
            { source, destination }
        );
    }
}
