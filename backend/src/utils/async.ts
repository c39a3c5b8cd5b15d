/**
 * Abort-aware async helpers shared by the catalog client and the
 * orchestrator. Each request owns its signal; nothing here keeps state
 * between requests.
 */

import { AppError, ErrorCategory, ErrorCode } from "./errors";

export function cancellationError(signal?: AbortSignal): AppError {
    const reason = signal?.reason;
    const message =
        reason instanceof Error && reason.message
            ? reason.message
            : "Request was cancelled";
    return new AppError(
        ErrorCode.REQUEST_CANCELLED,
        ErrorCategory.TRANSIENT,
        message
    );
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw cancellationError(signal);
    }
}

/**
 * Resolves after `ms`, or rejects with a cancellation error as soon as the
 * signal aborts. The timer never outlives an aborted signal.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(cancellationError(signal));
    }

    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(cancellationError(signal));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

export interface LinkedAbort {
    signal: AbortSignal;
    /** Detaches listeners and clears the timeout; call once the work is done. */
    dispose: () => void;
}

/**
 * Creates a signal that aborts when the parent aborts or when `timeoutMs`
 * elapses, whichever comes first.
 */
export function linkAbortSignal(
    parent: AbortSignal | undefined,
    timeoutMs: number,
    timeoutMessage: string
): LinkedAbort {
    const controller = new AbortController();

    const onParentAbort = () => {
        controller.abort(
            parent?.reason instanceof Error
                ? parent.reason
                : new Error("Request was cancelled by the caller")
        );
    };

    const timer = setTimeout(() => {
        controller.abort(new Error(timeoutMessage));
    }, timeoutMs);

    if (parent?.aborted) {
        onParentAbort();
    } else {
        parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    return {
        signal: controller.signal,
        dispose: () => {
            clearTimeout(timer);
            parent?.removeEventListener("abort", onParentAbort);
        },
    };
}
