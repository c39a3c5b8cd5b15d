import { AppError, ErrorCode } from "../errors";
import { cancellationError, linkAbortSignal, sleep, throwIfAborted } from "../async";

describe("async utils", () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    it("builds cancellation errors from the abort reason", () => {
        const controller = new AbortController();
        controller.abort(new Error("Client disconnected"));

        const error = cancellationError(controller.signal);

        expect(error).toBeInstanceOf(AppError);
        expect(error.code).toBe(ErrorCode.REQUEST_CANCELLED);
        expect(error.message).toBe("Client disconnected");
        expect(cancellationError().message).toBe("Request was cancelled");
    });

    it("throws only for aborted signals", () => {
        const controller = new AbortController();

        expect(() => throwIfAborted(controller.signal)).not.toThrow();
        expect(() => throwIfAborted(undefined)).not.toThrow();
        controller.abort();
        expect(() => throwIfAborted(controller.signal)).toThrow(AppError);
    });

    it("sleeps until the timer fires", async () => {
        jest.useFakeTimers();

        const done = jest.fn();
        const pending = sleep(1000).then(done);
        await jest.advanceTimersByTimeAsync(999);
        expect(done).not.toHaveBeenCalled();
        await jest.advanceTimersByTimeAsync(1);
        await pending;

        expect(done).toHaveBeenCalledTimes(1);
    });

    it("stops sleeping when the signal aborts", async () => {
        const controller = new AbortController();

        const pending = sleep(60000, controller.signal);
        controller.abort(new Error("Analysis timed out after 10ms"));

        await expect(pending).rejects.toThrow("Analysis timed out after 10ms");
        await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AppError);
    });

    it("aborts a linked signal on timeout", () => {
        jest.useFakeTimers();

        const linked = linkAbortSignal(undefined, 500, "Analysis timed out after 500ms");
        expect(linked.signal.aborted).toBe(false);
        jest.advanceTimersByTime(500);

        expect(linked.signal.aborted).toBe(true);
        expect(cancellationError(linked.signal).message).toBe("Analysis timed out after 500ms");
        linked.dispose();
    });

    it("follows the parent signal and detaches on dispose", () => {
        jest.useFakeTimers();
        const parent = new AbortController();

        const linked = linkAbortSignal(parent.signal, 500, "too slow");
        parent.abort(new Error("Client disconnected"));
        expect(cancellationError(linked.signal).message).toBe("Client disconnected");

        const other = new AbortController();
        const detached = linkAbortSignal(other.signal, 500, "too slow");
        detached.dispose();
        other.abort();
        jest.advanceTimersByTime(1000);
        expect(detached.signal.aborted).toBe(false);
        linked.dispose();
    });

    it("starts aborted when the parent already is", () => {
        const parent = new AbortController();
        parent.abort(new Error("Client went away"));

        const linked = linkAbortSignal(parent.signal, 500, "too slow");

        expect(linked.signal.aborted).toBe(true);
        expect(cancellationError(linked.signal).message).toBe("Client went away");
        linked.dispose();
    });
});
