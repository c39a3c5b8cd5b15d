/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the request
    NOT_FOUND = "NOT_FOUND", // Nothing matched; retrying will not help
    TRANSIENT = "TRANSIENT", // Provider trouble, may resolve later
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    INVALID_INPUT = "INVALID_INPUT",
    ARTIST_NOT_FOUND = "ARTIST_NOT_FOUND",
    PROVIDER_UNAVAILABLE = "PROVIDER_UNAVAILABLE",
    REQUEST_CANCELLED = "REQUEST_CANCELLED",
    INVALID_CONFIG = "INVALID_CONFIG",
    INVALID_PERSONA_LIBRARY = "INVALID_PERSONA_LIBRARY",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: ErrorDetails
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function invalidInput(message: string, details?: ErrorDetails): AppError {
    return new AppError(
        ErrorCode.INVALID_INPUT,
        ErrorCategory.RECOVERABLE,
        message,
        details
    );
}

export function artistNotFound(query: string): AppError {
    return new AppError(
        ErrorCode.ARTIST_NOT_FOUND,
        ErrorCategory.NOT_FOUND,
        `No artist found for "${query}"`,
        { query }
    );
}

export function providerUnavailable(
    message: string,
    details?: ErrorDetails
): AppError {
    return new AppError(
        ErrorCode.PROVIDER_UNAVAILABLE,
        ErrorCategory.TRANSIENT,
        message,
        details
    );
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === "string" ? error : "Unknown error";
}
