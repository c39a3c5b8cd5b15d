import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import { config } from "../config";

export function statusForCategory(category: ErrorCategory): number {
    switch (category) {
        case ErrorCategory.RECOVERABLE:
            return 400; // Caller can fix the request
        case ErrorCategory.NOT_FOUND:
            return 404;
        case ErrorCategory.TRANSIENT:
            return 503; // Caller can retry later
        case ErrorCategory.FATAL:
            return 500;
    }
}

export function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof AppError) {
        const statusCode = statusForCategory(err.category);

        if (statusCode >= 500) {
            logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);
        } else {
            logger.warn(`[AppError] ${err.code}: ${err.message}`);
        }

        return res.status(statusCode).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
    }

    // body-parser marks malformed JSON with a 4xx status
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    if (status >= 400 && status < 500) {
        return res.status(status).json({ error: "Malformed request body" });
    }

    logger.error("Unhandled error:", err.stack);

    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
