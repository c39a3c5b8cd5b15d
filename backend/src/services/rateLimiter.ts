/**
 * Catalog Rate Limiter
 *
 * Gates every outbound catalog call through a p-queue and retries throttled
 * or transient failures with exponential backoff. A run of consecutive 429s
 * opens a short circuit so concurrent searches stop hammering the provider.
 */

import PQueue from "p-queue";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { cancellationError, sleep as abortableSleep, throwIfAborted } from "../utils/async";
import { errorMessage } from "../utils/errors";

export interface RateLimitConfig {
    /** Requests per interval */
    intervalCap: number;
    /** Interval in milliseconds */
    interval: number;
    /** Maximum concurrent requests */
    concurrency: number;
    /** Retries after the first attempt */
    maxRetries: number;
    /** Base delay for exponential backoff (ms) */
    baseDelay: number;
    /** Upper bound for any single backoff (ms) */
    maxDelay: number;
}

export const DEFAULT_CATALOG_RATE_LIMIT: RateLimitConfig = {
    intervalCap: 10,
    interval: 1000,
    concurrency: 4,
    maxRetries: 3,
    baseDelay: 500,
    maxDelay: 30000,
};

export interface ExecuteOptions {
    signal?: AbortSignal;
    /** Shown in retry logs. */
    label?: string;
}

/** What the catalog client needs from a limiter; tests pass a pass-through. */
export interface RequestExecutor {
    execute<T>(requestFn: () => Promise<T>, options?: ExecuteOptions): Promise<T>;
}

interface CircuitState {
    isOpen: boolean;
    openedAt: number;
    consecutiveRateLimits: number;
    resetAfterMs: number;
}

const CIRCUIT_THRESHOLD = 5;
const CIRCUIT_INITIAL_RESET_MS = 5000;
const CIRCUIT_MAX_RESET_MS = 30000;
const MAX_JITTER_MS = 250;

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

function readProperty(value: unknown, key: string): unknown {
    return typeof value === "object" && value !== null && key in value
        ? Reflect.get(value, key)
        : undefined;
}

/** HTTP status of an axios-style error, if it carries one. */
export function getHttpStatus(error: unknown): number | null {
    const status = readProperty(readProperty(error, "response"), "status");
    return typeof status === "number" ? status : null;
}

export function isRateLimitError(error: unknown): boolean {
    return getHttpStatus(error) === 429;
}

export function isTransientError(error: unknown): boolean {
    const status = getHttpStatus(error);
    const rawCode = readProperty(error, "code");
    const rawMessage = readProperty(error, "message");
    const code = typeof rawCode === "string" ? rawCode : undefined;
    const message = typeof rawMessage === "string" ? rawMessage.toLowerCase() : "";

    if (code && TRANSIENT_CODES.has(code)) {
        return true;
    }
    if (status !== null && status >= 500 && status <= 599) {
        return true;
    }
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

/** Retry-After in milliseconds, when the provider sent a usable value. */
export function getRetryAfterMs(error: unknown): number | null {
    const headers = readProperty(readProperty(error, "response"), "headers");
    const header = readProperty(headers, "retry-after");
    if (typeof header !== "string" && typeof header !== "number") {
        return null;
    }
    const seconds = Number.parseInt(String(header), 10);
    return Number.isNaN(seconds) || seconds < 0 ? null : seconds * 1000;
}

export interface CatalogRateLimiterDeps {
    logger?: Logger;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
    now?: () => number;
}

export class CatalogRateLimiter implements RequestExecutor {
    private readonly queue: PQueue;
    private readonly circuit: CircuitState = {
        isOpen: false,
        openedAt: 0,
        consecutiveRateLimits: 0,
        resetAfterMs: CIRCUIT_INITIAL_RESET_MS,
    };
    private readonly log: Logger;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    private readonly random: () => number;
    private readonly now: () => number;

    constructor(
        private readonly config: RateLimitConfig = DEFAULT_CATALOG_RATE_LIMIT,
        deps: CatalogRateLimiterDeps = {}
    ) {
        this.queue = new PQueue({
            concurrency: config.concurrency,
            intervalCap: config.intervalCap,
            interval: config.interval,
            carryoverConcurrencyCount: true,
        });
        this.log = deps.logger ?? rootLogger.child("rateLimiter");
        this.sleep = deps.sleep ?? abortableSleep;
        this.random = deps.random ?? Math.random;
        this.now = deps.now ?? Date.now;
    }

    /**
     * Execute a request with rate limiting and automatic retry
     */
    async execute<T>(
        requestFn: () => Promise<T>,
        options: ExecuteOptions = {}
    ): Promise<T> {
        const { signal, label = "catalog request" } = options;
        const { maxRetries } = this.config;

        for (let attempt = 0; ; attempt++) {
            throwIfAborted(signal);
            await this.waitForCircuit(signal);

            try {
                const result = await this.queue.add(() => {
                    throwIfAborted(signal);
                    return requestFn();
                });
                this.circuit.consecutiveRateLimits = 0;
                this.circuit.resetAfterMs = CIRCUIT_INITIAL_RESET_MS;
                return result;
            } catch (error) {
                if (signal?.aborted) {
                    throw cancellationError(signal);
                }

                const rateLimited = isRateLimitError(error);
                if (!rateLimited && !isTransientError(error)) {
                    throw error;
                }

                if (rateLimited) {
                    this.recordRateLimit();
                }

                if (attempt >= maxRetries) {
                    this.log.warn(
                        `${label} failed after ${attempt + 1} attempt(s): ${errorMessage(error)}`
                    );
                    throw error;
                }

                const delay = this.calculateBackoff(attempt, error);
                this.log.warn(
                    `${rateLimited ? "Rate limited" : "Transient error"} on ${label} (attempt ${
                        attempt + 1
                    }/${maxRetries + 1}) - backing off ${delay}ms`
                );
                await this.sleep(delay, signal);
            }
        }
    }

    /**
     * Exponential backoff: Retry-After when present, otherwise
     * baseDelay × 2^attempt plus jitter, capped at maxDelay.
     */
    calculateBackoff(attempt: number, error?: unknown): number {
        const retryAfter = getRetryAfterMs(error);
        if (retryAfter !== null) {
            return Math.min(retryAfter, this.config.maxDelay);
        }
        const exponentialDelay = this.config.baseDelay * Math.pow(2, attempt);
        const jitter = Math.floor(this.random() * MAX_JITTER_MS);
        return Math.min(exponentialDelay + jitter, this.config.maxDelay);
    }

    private recordRateLimit(): void {
        this.circuit.consecutiveRateLimits++;
        if (this.circuit.consecutiveRateLimits < CIRCUIT_THRESHOLD || this.circuit.isOpen) {
            return;
        }
        this.circuit.isOpen = true;
        this.circuit.openedAt = this.now();
        this.log.warn(
            `Circuit opened after ${this.circuit.consecutiveRateLimits} consecutive rate limits - pausing ${this.circuit.resetAfterMs}ms`
        );
    }

    private async waitForCircuit(signal?: AbortSignal): Promise<void> {
        if (!this.circuit.isOpen) {
            return;
        }
        const elapsed = this.now() - this.circuit.openedAt;
        const resetAfterMs = this.circuit.resetAfterMs;
        if (elapsed < resetAfterMs) {
            await this.sleep(resetAfterMs - elapsed, signal);
        }
        this.circuit.isOpen = false;
        this.circuit.consecutiveRateLimits = 0;
        this.circuit.resetAfterMs = Math.min(CIRCUIT_MAX_RESET_MS, resetAfterMs * 2);
    }
}
