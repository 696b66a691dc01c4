import axios, { AxiosInstance, isAxiosError } from "axios";
import { BRAND_USER_AGENT } from "../config/brand";
import type { AcoustidConfig } from "../config";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import { Logger, silentLogger, withLogTiming } from "../utils/logger";
import { RateLimiter } from "./rateLimiter";
import { lookupResponseSchema, parseOrNull } from "./resolution/lookupResponse";
import type { CorrectionSubmission, FingerprintResult } from "./resolution/types";

export const LOOKUP_META = "recordings releasegroups";

/** Narrow view of the service used by the resolution workflow. */
export interface FingerprintLookup {
    lookup(fingerprint: FingerprintResult): Promise<unknown>;
    submit(submission: CorrectionSubmission): Promise<boolean>;
}

function serviceErrorMessage(body: unknown): string | undefined {
    return parseOrNull(lookupResponseSchema, body)?.error?.message;
}

/**
 * Client for the AcoustID web service. Lookup responses are returned raw;
 * interpreting them is left to the candidate extractor.
 */
export class AcoustidService implements FingerprintLookup {
    private client: AxiosInstance;

    constructor(
        private readonly config: AcoustidConfig,
        private readonly rateLimiter: RateLimiter = new RateLimiter(),
        private readonly logger: Logger = silentLogger
    ) {
        this.client = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: {
                "User-Agent": BRAND_USER_AGENT,
            },
        });
    }

    async lookup(fingerprint: FingerprintResult): Promise<unknown> {
        const body = new URLSearchParams({
            client: this.config.applicationApiKey,
            duration: String(Math.round(fingerprint.duration)),
            fingerprint: fingerprint.fingerprint,
            meta: LOOKUP_META,
            format: "json",
        });

        const data = await this.post("/lookup", body, ErrorCode.LOOKUP_FAILED);
        const parsed = parseOrNull(lookupResponseSchema, data);
        if (parsed?.status === "error") {
            throw new AppError(
                ErrorCode.LOOKUP_FAILED,
                ErrorCategory.FATAL,
                `AcoustID lookup returned an error: ${parsed.error?.message ?? "unknown error"}`,
                { serviceCode: parsed.error?.code }
            );
        }
        return data;
    }

    /**
     * Submits a corrected identification. Returns false without calling the
     * service when no user API key is configured.
     */
    async submit(submission: CorrectionSubmission): Promise<boolean> {
        const userApiKey = this.config.userApiKey;
        if (!userApiKey) {
            this.logger.warn(
                "ACOUSTID_USER_API_KEY is not set - skipping correction submission"
            );
            return false;
        }

        const body = new URLSearchParams({
            client: this.config.applicationApiKey,
            user: userApiKey,
            format: "json",
            "duration.0": String(Math.round(submission.duration)),
            "fingerprint.0": submission.fingerprint,
            "artist.0": submission.artist,
            "track.0": submission.track,
            "album.0": submission.album,
            "albumartist.0": submission.albumartist,
            "fileformat.0": submission.fileformat,
        });

        // a retried POST could register the same submission twice
        const data = await this.post("/submit", body, ErrorCode.SUBMISSION_FAILED, {
            skipRetry: true,
        });
        const parsed = parseOrNull(lookupResponseSchema, data);
        if (parsed?.status === "error") {
            throw new AppError(
                ErrorCode.SUBMISSION_FAILED,
                ErrorCategory.FATAL,
                `AcoustID submission returned an error: ${parsed.error?.message ?? "unknown error"}`,
                { serviceCode: parsed.error?.code }
            );
        }
        return true;
    }

    private async post(
        endpoint: string,
        body: URLSearchParams,
        failureCode: ErrorCode,
        options?: { skipRetry?: boolean }
    ): Promise<unknown> {
        try {
            return await withLogTiming(
                this.logger,
                `POST ${endpoint}`,
                () =>
                    this.rateLimiter.execute(async () => {
                        const response = await this.client.post<unknown>(endpoint, body);
                        return response.data;
                    }, options),
                { endpoint }
            );
        } catch (error) {
            const status = isAxiosError(error) ? error.response?.status : undefined;
            const detail =
                (isAxiosError(error) && serviceErrorMessage(error.response?.data)) ||
                errorMessage(error);
            throw new AppError(
                failureCode,
                ErrorCategory.TRANSIENT,
                `AcoustID request to ${endpoint} failed: ${detail}`,
                { status }
            );
        }
    }
}
