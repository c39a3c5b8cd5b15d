import { createServer } from "http";
import type { Socket } from "net";
import { config } from "./config";
import { logger } from "./utils/logger";
import { createApp, createAnalysisServices } from "./app";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 10000;

const app = createApp({
    services: createAnalysisServices(config),
    allowedOrigins: config.allowedOrigins,
    trustProxy: config.trustProxy,
    healthTimeoutMs: config.catalog.timeoutMs,
});

const httpServer = createServer(app);
const activeHttpConnections = new Set<Socket>();

httpServer.on("connection", (socket) => {
    activeHttpConnections.add(socket);
    socket.on("close", () => {
        activeHttpConnections.delete(socket);
    });
});

httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(`[Startup] Listening on port ${config.port} (${config.nodeEnv})`);
});

let isShuttingDown = false;

async function closeHttpServerWithTimeout(timeoutMs: number): Promise<void> {
    await new Promise<void>((resolve) => {
        let settled = false;
        const finish = () => {
            if (settled) return;
            settled = true;
            clearTimeout(timeoutId);
            resolve();
        };

        const timeoutId = setTimeout(() => {
            const openConnections = activeHttpConnections.size;
            if (openConnections > 0) {
                logger.warn(
                    `[Shutdown] HTTP server close timed out after ${timeoutMs}ms; forcing ${openConnections} active connection(s) closed`
                );
            }
            httpServer.closeAllConnections();
            finish();
        }, timeoutMs);
        timeoutId.unref();

        httpServer.close(() => {
            finish();
        });
        httpServer.closeIdleConnections();
    });
}

async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
        await closeHttpServerWithTimeout(HTTP_SERVER_CLOSE_TIMEOUT_MS);
        logger.debug("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception - initiating graceful shutdown:", {
        message: error.message,
        stack: error.stack,
    });
    void gracefulShutdown("uncaughtException");
});
