import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { parseEnvFloat, parseEnvInt, parseEnvOptional } from "./utils/envParsers";
import { LogLevel, parseLogLevel } from "./utils/logger";
import {
    ConfidenceThresholds,
    ReleaseTier,
    ReleaseTierScheme,
} from "./services/resolution/types";

export const DEFAULT_ACOUSTID_API_URL = "https://api.acoustid.org/v2";

export interface AcoustidConfig {
    baseUrl: string;
    applicationApiKey: string;
    userApiKey?: string;
    timeoutMs: number;
}

export interface FingerprintConfig {
    fpcalcPath: string;
    timeoutMs: number;
}

export interface ResolverConfig {
    acoustid: AcoustidConfig;
    fingerprint: FingerprintConfig;
    thresholds: ConfidenceThresholds;
    tierScheme: ReleaseTierScheme;
    logLevel: LogLevel;
}

const releaseTierNames = ["NONE", "MIX", "COMPILATION", "SINGLE", "ALBUM"] as const;

const resolverConfigSchema = z.object({
    acoustid: z.object({
        baseUrl: z.string().url("ACOUSTID_API_URL must be a URL"),
        applicationApiKey: z
            .string()
            .min(1, "ACOUSTID_APPLICATION_API_KEY is required"),
        userApiKey: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive("ACOUSTID_TIMEOUT_MS must be a positive integer"),
    }),
    fingerprint: z.object({
        fpcalcPath: z.string().min(1),
        timeoutMs: z.number().int().positive("FPCALC_TIMEOUT_MS must be a positive integer"),
    }),
    thresholds: z.object({
        minAudioScore: z
            .number()
            .min(0, "MATCH_MIN_AUDIO_SCORE must be within [0,1]")
            .max(1, "MATCH_MIN_AUDIO_SCORE must be within [0,1]"),
        minFileScore: z
            .number()
            .int()
            .min(0, "MATCH_MIN_FILE_SCORE must be within [0,100]")
            .max(100, "MATCH_MIN_FILE_SCORE must be within [0,100]"),
        minReleaseTier: z.enum(releaseTierNames),
    }),
    tierScheme: z.enum(["simple", "extended"]),
});

/**
 * Builds the resolver configuration from environment variables. Call
 * `dotenv.config()` first when a `.env` file should be honoured.
 */
export function loadResolverConfig(
    env: NodeJS.ProcessEnv = process.env
): ResolverConfig {
    const candidate = {
        acoustid: {
            baseUrl: parseEnvOptional(env.ACOUSTID_API_URL) ?? DEFAULT_ACOUSTID_API_URL,
            applicationApiKey: env.ACOUSTID_APPLICATION_API_KEY?.trim() ?? "",
            userApiKey: parseEnvOptional(env.ACOUSTID_USER_API_KEY),
            timeoutMs: parseEnvInt(env.ACOUSTID_TIMEOUT_MS, 10000),
        },
        fingerprint: {
            fpcalcPath: parseEnvOptional(env.FPCALC_PATH) ?? "fpcalc",
            timeoutMs: parseEnvInt(env.FPCALC_TIMEOUT_MS, 30000),
        },
        thresholds: {
            minAudioScore: parseEnvFloat(env.MATCH_MIN_AUDIO_SCORE, 0.4),
            minFileScore: parseEnvInt(env.MATCH_MIN_FILE_SCORE, 70),
            minReleaseTier: (
                parseEnvOptional(env.MATCH_MIN_RELEASE_TIER) ?? "SINGLE"
            ).toUpperCase(),
        },
        tierScheme: (
            parseEnvOptional(env.RELEASE_TIER_SCHEME) ?? "extended"
        ).toLowerCase(),
    };

    const parsed = resolverConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (err) => `${err.path.join(".")}: ${err.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid configuration:\n   - ${issues.join("\n   - ")}`,
            { issues }
        );
    }

    const { acoustid, fingerprint, thresholds, tierScheme } = parsed.data;
    return {
        acoustid,
        fingerprint,
        thresholds: {
            minAudioScore: thresholds.minAudioScore,
            minFileScore: thresholds.minFileScore,
            minReleaseTier: ReleaseTier[thresholds.minReleaseTier],
        },
        tierScheme,
        logLevel: parseLogLevel(env.LOG_LEVEL),
    };
}
