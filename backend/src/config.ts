import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { isEnvFlagEnabled, parseEnvCsv, parseEnvInt } from "./utils/envParsers";

dotenv.config();

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    PORT: z.string().regex(/^\d+$/, "PORT must be numeric").optional(),
    SPOTIFY_CLIENT_ID: z.string().optional(),
    SPOTIFY_CLIENT_SECRET: z.string().optional(),
    SPOTIFY_MARKET: z
        .string()
        .regex(/^[A-Z]{2}$/, "SPOTIFY_MARKET must be an ISO 3166-1 alpha-2 code")
        .optional(),
    CATALOG_TIMEOUT_MS: z.string().optional(),
    CATALOG_MAX_RETRIES: z.string().optional(),
    CATALOG_BASE_DELAY_MS: z.string().optional(),
    ANALYSIS_TIMEOUT_MS: z.string().optional(),
    MAX_INSIGHTS: z.string().optional(),
    HISTORY_FILE: z.string().optional(),
    ALLOWED_ORIGINS: z.string().optional(),
    TRUST_PROXY: z.string().optional(),
});

export interface CatalogConfig {
    clientId: string | null;
    clientSecret: string | null;
    market: string;
    /** Per-attempt HTTP timeout. */
    timeoutMs: number;
    maxRetries: number;
    baseDelayMs: number;
}

export interface AppConfig {
    port: number;
    nodeEnv: "development" | "production" | "test";
    catalog: CatalogConfig;
    analysisTimeoutMs: number;
    maxInsights: number;
    historyFile: string;
    allowedOrigins: string[] | true;
    trustProxy: boolean;
}

function clampInt(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function credential(value: string | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

/**
 * Builds the runtime configuration from an environment map. Missing catalog
 * credentials are allowed: the service starts and reports itself degraded.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Environment validation failed: ${issues.join("; ")}`,
            { issues }
        );
    }

    const values = parsed.data;
    const nodeEnv = values.NODE_ENV ?? "development";

    return {
        port: parseEnvInt(values.PORT, 3847),
        nodeEnv,
        catalog: {
            clientId: credential(values.SPOTIFY_CLIENT_ID),
            clientSecret: credential(values.SPOTIFY_CLIENT_SECRET),
            market: values.SPOTIFY_MARKET ?? "US",
            timeoutMs: clampInt(parseEnvInt(values.CATALOG_TIMEOUT_MS, 8000), 500, 60000),
            // Spotify throttles aggressively; more than 4 attempts only delays the failure
            maxRetries: clampInt(parseEnvInt(values.CATALOG_MAX_RETRIES, 3), 0, 4),
            baseDelayMs: clampInt(parseEnvInt(values.CATALOG_BASE_DELAY_MS, 500), 50, 10000),
        },
        analysisTimeoutMs: clampInt(
            parseEnvInt(values.ANALYSIS_TIMEOUT_MS, 15000),
            1000,
            120000
        ),
        maxInsights: clampInt(parseEnvInt(values.MAX_INSIGHTS, 10), 1, 12),
        historyFile: values.HISTORY_FILE?.trim() || "./.artistlens-history.json",
        allowedOrigins:
            parseEnvCsv(values.ALLOWED_ORIGINS) ??
            (nodeEnv === "development" ? true : []),
        trustProxy: isEnvFlagEnabled(values.TRUST_PROXY),
    };
}

function loadProcessConfig(): AppConfig {
    try {
        const loaded = loadConfig(process.env);
        if (!loaded.catalog.clientId || !loaded.catalog.clientSecret) {
            logger.warn(
                "SPOTIFY_CLIENT_ID or SPOTIFY_CLIENT_SECRET is missing - catalog lookups will fail until they are set"
            );
        }
        return loaded;
    } catch (error) {
        if (error instanceof AppError) {
            logger.error(error.message);
            logger.error("Please check your .env file.");
            process.exit(1);
        }
        throw error;
    }
}

/** Centralized runtime configuration loaded from the process environment. */
export const config: AppConfig = loadProcessConfig();
