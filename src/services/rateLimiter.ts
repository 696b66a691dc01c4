/**
 * Rate limiter for calls to the fingerprint service.
 *
 * Queues requests under a per-interval cap and retries rate-limited or
 * transient failures with exponential backoff, up to a fixed number of attempts.
 */

import PQueue from "p-queue";
import { isAxiosError } from "axios";
import { Logger, silentLogger } from "../utils/logger";
import { errorMessage } from "../utils/errors";

export interface RateLimitConfig {
    /** Requests per interval */
    intervalCap: number;
    /** Interval in milliseconds */
    interval: number;
    /** Maximum concurrent requests */
    concurrency: number;
    /** Maximum retries on 429 / transient errors */
    maxRetries: number;
    /** Base delay for exponential backoff (ms) */
    baseDelay: number;
}

// AcoustID allows three requests per second per client key
export const ACOUSTID_RATE_LIMIT: RateLimitConfig = {
    intervalCap: 3,
    interval: 1000,
    concurrency: 1,
    maxRetries: 3,
    baseDelay: 1000,
};

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

export type SleepFn = (ms: number) => Promise<void>;

const defaultSleep: SleepFn = (ms) =>
    new Promise((resolve) => setTimeout(resolve, ms));

function responseStatus(error: unknown): number | undefined {
    return isAxiosError(error) ? error.response?.status : undefined;
}

export function isRateLimitError(error: unknown): boolean {
    if (responseStatus(error) === 429) {
        return true;
    }
    const message = errorMessage(error).toLowerCase();
    return message.includes("429") || message.includes("rate limit");
}

export function isTransientError(error: unknown): boolean {
    const status = responseStatus(error);
    if (typeof status === "number" && status >= 500 && status <= 599) {
        return true;
    }

    const code = isAxiosError(error) ? error.code : undefined;
    if (code && TRANSIENT_CODES.has(code)) {
        return true;
    }

    const message = errorMessage(error).toLowerCase();
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

export class RateLimiter {
    private readonly queue: PQueue;

    constructor(
        private readonly config: RateLimitConfig = ACOUSTID_RATE_LIMIT,
        private readonly logger: Logger = silentLogger,
        private readonly sleep: SleepFn = defaultSleep
    ) {
        this.queue = new PQueue({
            concurrency: config.concurrency,
            intervalCap: config.intervalCap,
            interval: config.interval,
            carryoverConcurrencyCount: true,
        });
    }

    /**
     * Execute a request with rate limiting and bounded retry
     */
    async execute<T>(
        requestFn: () => Promise<T>,
        options?: { skipRetry?: boolean }
    ): Promise<T> {
        const maxRetries = options?.skipRetry ? 0 : this.config.maxRetries;

        for (let attempt = 0; ; attempt++) {
            try {
                return await this.queue.add(() => requestFn());
            } catch (error) {
                const rateLimited = isRateLimitError(error);
                if (!(rateLimited || isTransientError(error)) || attempt >= maxRetries) {
                    throw error;
                }

                const delay = this.calculateBackoff(attempt, error);
                this.logger.warn(
                    `${rateLimited ? "Rate limited" : "Transient error"} (attempt ${attempt + 1}/${
                        maxRetries + 1
                    }) - retrying in ${delay}ms: ${errorMessage(error)}`
                );
                await this.sleep(delay);
            }
        }
    }

    /**
     * Calculate exponential backoff delay, honouring Retry-After
     */
    calculateBackoff(attempt: number, error?: unknown): number {
        const retryAfter = isAxiosError(error)
            ? error.response?.headers?.["retry-after"]
            : undefined;
        if (typeof retryAfter === "string") {
            const parsed = Number.parseInt(retryAfter, 10);
            if (!Number.isNaN(parsed)) {
                return parsed * 1000;
            }
        }

        const exponentialDelay = this.config.baseDelay * Math.pow(2, attempt);
        return Math.min(exponentialDelay, 60000);
    }
}
