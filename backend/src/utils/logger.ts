export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVELS;

/**
 * LOG_LEVEL wins when it names a known level; an unknown value silences
 * output rather than guessing. Without it, production logs warnings only.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return env.NODE_ENV === "production" ? "warn" : "info";
    }
    return isLogLevel(configured) ? configured : "silent";
}

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }
    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
}

function normalizeContext(context: LogContext): LogContext {
    return Object.fromEntries(
        Object.entries(context).map(([key, value]) => [key, normalizeError(value)]),
    );
}

const CONSOLE_METHODS: Record<Exclude<LogLevel, "silent">, (...data: unknown[]) => void> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.info(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

export interface LoggerOptions {
    level?: LogLevel;
}

export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
    const scoped = scope?.trim() || null;
    const threshold = LOG_LEVELS[options.level ?? resolveLogLevel()];

    const emit = (
        level: Exclude<LogLevel, "silent">,
        message: string,
        args: unknown[],
    ): void => {
        if (LOG_LEVELS[level] < threshold) {
            return;
        }

        const prefix = scoped
            ? `[${level.toUpperCase()}] [${scoped}] ${message}`
            : `[${level.toUpperCase()}] ${message}`;
        const [first, ...rest] = args;
        const write = CONSOLE_METHODS[level];

        if (isLogContextCandidate(first)) {
            write(prefix, normalizeContext(first), ...rest.map(normalizeError));
            return;
        }
        write(prefix, ...args.map(normalizeError));
    };

    return {
        debug: (message, ...args) => emit("debug", message, args),
        info: (message, ...args) => emit("info", message, args),
        warn: (message, ...args) => emit("warn", message, args),
        error: (message, ...args) => emit("error", message, args),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed, options);
        },
    };
}

/** Runs `run`, logging its duration at debug level and any failure at error level. */
export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {},
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.error(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export const logger = createLogger("artistlens");
