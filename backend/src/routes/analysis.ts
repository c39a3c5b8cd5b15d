import { Router, type RequestHandler, type Response } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { linkAbortSignal } from "../utils/async";
import { ErrorCode, errorMessage } from "../utils/errors";
import type { CatalogClient } from "../services/catalog";
import type {
    AnalysisFailure,
    AnalysisFailureKind,
    AnalysisOrchestrator,
} from "../services/analysisOrchestrator";

const searchBodySchema = z.object({
    query: z.string({
        required_error: "Search query is required",
        invalid_type_error: "Search query must be a string",
    }),
});

const FAILURE_STATUS: Record<AnalysisFailureKind, number> = {
    InvalidInput: 400,
    NotFound: 404,
    ProviderUnavailable: 503,
};

/** Failed searches answer `{ error, code, kind }` with the status for their kind. */
const sendFailure = (res: Response, failure: AnalysisFailure): Response =>
    res.status(FAILURE_STATUS[failure.kind]).json({
        error: failure.message,
        code: failure.code,
        kind: failure.kind,
    });

export interface AnalysisRouterDeps {
    orchestrator: Pick<AnalysisOrchestrator, "analyze">;
    catalog: Pick<CatalogClient, "ping">;
    /** Bound on the health probe's catalog round trip. */
    healthTimeoutMs: number;
    searchLimiter?: RequestHandler;
    now?: () => Date;
}

export function createAnalysisRouter(deps: AnalysisRouterDeps): Router {
    const router = Router();
    const now = deps.now ?? (() => new Date());
    const passThrough: RequestHandler = (_req, _res, next) => next();

    /**
     * POST /api/search
     * Analyzes the best-matching artist for `query`. The response carries the
     * history entry the client should record; the server keeps no history.
     */
    router.post("/search", deps.searchLimiter ?? passThrough, async (req, res, next) => {
        const parsed = searchBodySchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return sendFailure(res, {
                kind: "InvalidInput",
                message: parsed.error.errors[0]?.message ?? "Invalid request body",
                code: ErrorCode.INVALID_INPUT,
            });
        }

        // Abandon catalog calls once the client goes away
        const controller = new AbortController();
        res.on("close", () => {
            if (!res.writableEnded) {
                controller.abort(new Error("Client disconnected"));
            }
        });

        try {
            const outcome = await deps.orchestrator.analyze(parsed.data.query, {
                signal: controller.signal,
            });

            if (outcome.status === "failed") {
                return sendFailure(res, outcome.error);
            }

            return res.json({
                result: outcome.result,
                historyEntry: outcome.historyEntry,
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/health
     * `degraded` when the catalog rejects our credentials or cannot be reached.
     */
    router.get("/health", async (_req, res) => {
        const linked = linkAbortSignal(undefined, deps.healthTimeoutMs, "Health probe timed out");
        let catalogReachable = false;
        try {
            catalogReachable = await deps.catalog.ping({ signal: linked.signal });
        } catch (error) {
            logger.warn(`Catalog health probe failed: ${errorMessage(error)}`);
        } finally {
            linked.dispose();
        }

        res.json({
            status: catalogReachable ? "ok" : "degraded",
            catalogReachable,
            timestamp: now().toISOString(),
        });
    });

    return router;
}
