import express, { type Express, type RequestHandler } from "express";
import cors from "cors";
import helmet from "helmet";
import type { AppConfig } from "./config";
import { logger } from "./utils/logger";
import { errorHandler } from "./middleware/errorHandler";
import { apiLimiter, createSearchLimiter } from "./middleware/rateLimiter";
import { createAnalysisRouter } from "./routes/analysis";
import type { CatalogClient } from "./services/catalog";
import { SpotifyCatalogClient } from "./services/spotify";
import { CatalogRateLimiter, DEFAULT_CATALOG_RATE_LIMIT } from "./services/rateLimiter";
import { AnalysisOrchestrator } from "./services/analysisOrchestrator";
import { PersonaSelector } from "./services/analysis/personas/selector";
import { loadDefaultPersonaLibrary } from "./services/analysis/personas/library";

export interface AnalysisServices {
    catalog: CatalogClient;
    orchestrator: AnalysisOrchestrator;
}

/** Wires the production catalog, persona library and orchestrator. */
export function createAnalysisServices(appConfig: AppConfig): AnalysisServices {
    const executor = new CatalogRateLimiter({
        ...DEFAULT_CATALOG_RATE_LIMIT,
        maxRetries: appConfig.catalog.maxRetries,
        baseDelay: appConfig.catalog.baseDelayMs,
    });
    const catalog = new SpotifyCatalogClient(appConfig.catalog, executor);
    const selector = new PersonaSelector(loadDefaultPersonaLibrary(), {
        maxInsights: appConfig.maxInsights,
    });
    const orchestrator = new AnalysisOrchestrator({
        catalog,
        selector,
        timeoutMs: appConfig.analysisTimeoutMs,
    });
    return { catalog, orchestrator };
}

export interface CreateAppOptions {
    services: AnalysisServices;
    allowedOrigins: string[] | true;
    trustProxy?: boolean;
    healthTimeoutMs: number;
    /** Replaces the per-IP search limiter; tests pass their own. */
    searchLimiter?: RequestHandler;
    now?: () => Date;
}

export function createApp(options: CreateAppOptions): Express {
    const app = express();

    if (options.trustProxy) {
        app.set("trust proxy", true);
    }

    app.use(helmet());
    app.use(
        cors({
            origin: (origin, callback) => {
                if (!origin || options.allowedOrigins === true) {
                    callback(null, true);
                } else if (options.allowedOrigins.includes(origin)) {
                    callback(null, true);
                } else {
                    logger.debug(`[CORS] Origin ${origin} not in allowlist`);
                    callback(null, false);
                }
            },
        })
    );
    app.use(express.json({ limit: "10kb" }));

    app.use(
        "/api",
        apiLimiter,
        createAnalysisRouter({
            orchestrator: options.services.orchestrator,
            catalog: options.services.catalog,
            healthTimeoutMs: options.healthTimeoutMs,
            searchLimiter: options.searchLimiter ?? createSearchLimiter(),
            now: options.now,
        })
    );

    app.use((_req, res) => {
        res.status(404).json({ error: "Not found" });
    });
    app.use(errorHandler);

    return app;
}
