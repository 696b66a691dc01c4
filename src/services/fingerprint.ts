import { spawn } from "child_process";
import { z } from "zod";
import type { FingerprintConfig } from "../config";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import { Logger, silentLogger } from "../utils/logger";
import type { FingerprintResult } from "./resolution/types";

const fpcalcOutputSchema = z.object({
    duration: z.number().nonnegative(),
    fingerprint: z.string().min(1),
});

export interface Fingerprinter {
    fingerprint(filePath: string): Promise<FingerprintResult>;
}

function fingerprintError(filePath: string, reason: string): AppError {
    return new AppError(
        ErrorCode.FINGERPRINT_FAILED,
        ErrorCategory.RECOVERABLE,
        `Could not fingerprint ${filePath}: ${reason}`,
        { filePath }
    );
}

/**
 * Parses the output of `fpcalc -json`.
 */
export function parseFpcalcOutput(filePath: string, stdout: string): FingerprintResult {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout.trim());
    } catch (error) {
        throw fingerprintError(filePath, `invalid fpcalc output (${errorMessage(error)})`);
    }

    const parsed = fpcalcOutputSchema.safeParse(raw);
    if (!parsed.success) {
        throw fingerprintError(filePath, "fpcalc output has no fingerprint");
    }
    return parsed.data;
}

/**
 * Computes Chromaprint fingerprints with the external `fpcalc` binary.
 */
export class FpcalcFingerprinter implements Fingerprinter {
    constructor(
        private readonly config: FingerprintConfig,
        private readonly logger: Logger = silentLogger
    ) {}

    async fingerprint(filePath: string): Promise<FingerprintResult> {
        const stdout = await this.run(filePath);
        const result = parseFpcalcOutput(filePath, stdout);
        this.logger.debug("Fingerprint computed", {
            filePath,
            duration: result.duration,
        });
        return result;
    }

    private run(filePath: string): Promise<string> {
        const { fpcalcPath, timeoutMs } = this.config;

        return new Promise<string>((resolve, reject) => {
            const proc = spawn(fpcalcPath, ["-json", filePath], {
                stdio: ["ignore", "pipe", "pipe"],
            });

            let stdout = "";
            let stderr = "";
            const timeoutId = setTimeout(() => {
                proc.kill("SIGKILL");
                reject(fingerprintError(filePath, `fpcalc timed out after ${timeoutMs}ms`));
            }, timeoutMs);

            proc.stdout.on("data", (chunk: Buffer) => {
                stdout += chunk.toString("utf8");
            });
            proc.stderr.on("data", (chunk: Buffer) => {
                stderr += chunk.toString("utf8");
            });

            proc.on("error", (error) => {
                clearTimeout(timeoutId);
                reject(fingerprintError(filePath, errorMessage(error)));
            });

            proc.on("close", (code) => {
                clearTimeout(timeoutId);
                if (code === 0) {
                    resolve(stdout);
                    return;
                }

                reject(
                    fingerprintError(
                        filePath,
                        `fpcalc exited with code ${code}: ${stderr.trim() || "no output"}`
                    )
                );
            });
        });
    }
}
