import rateLimit from "express-rate-limit";

// Proxy trust is configured on the app (TRUST_PROXY); the limiter's own
// check would warn on every request behind a reverse proxy.
const trustProxyValidation = { validate: { trustProxy: false } };

export const SEARCH_WINDOW_MS = 60 * 60 * 1000;
export const SEARCH_LIMIT = 30;

// Every search fans out to several catalog calls, so the per-IP budget is small
export function createSearchLimiter(limit: number = SEARCH_LIMIT) {
    return rateLimit({
        windowMs: SEARCH_WINDOW_MS,
        max: limit,
        message: { error: "Too many searches from this IP, please try again later." },
        standardHeaders: true,
        legacyHeaders: false,
        ...trustProxyValidation,
    });
}

// General API limiter; only stops runaway clients
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: 300,
    message: { error: "Too many requests from this IP, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === "/health" || req.path === "/api/health",
    ...trustProxyValidation,
});
