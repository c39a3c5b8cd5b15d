import fs from "fs";
import path from "path";
import {
    EMPTY_HISTORY_LOG,
    HISTORY_CAPACITY,
    normalizeHistoryLog,
    recordHistoryEntry,
    type HistoryEntry,
    type HistoryLog,
} from "@artistlens/insight-contract";
import { logger as rootLogger, type Logger } from "../../utils/logger";
import { errorMessage } from "../../utils/errors";

export interface HistoryStore {
    load(): HistoryLog;
    save(log: HistoryLog): void;
}

export class MemoryHistoryStore implements HistoryStore {
    private log: HistoryLog = EMPTY_HISTORY_LOG;

    load(): HistoryLog {
        return this.log;
    }

    save(log: HistoryLog): void {
        this.log = log;
    }
}

/**
 * Keeps the log in a small JSON file. A missing file is an empty log; a file
 * that cannot be parsed is logged and treated as empty, and the next save
 * overwrites it.
 */
export class JsonFileHistoryStore implements HistoryStore {
    constructor(
        private readonly filePath: string,
        private readonly capacity: number = HISTORY_CAPACITY,
        private readonly log: Logger = rootLogger.child("history")
    ) {}

    load(): HistoryLog {
        let raw: string;
        try {
            raw = fs.readFileSync(this.filePath, "utf8");
        } catch (error) {
            if (isMissingFile(error)) {
                return EMPTY_HISTORY_LOG;
            }
            throw error;
        }

        try {
            return normalizeHistoryLog(JSON.parse(raw), this.capacity);
        } catch (error) {
            this.log.warn(
                `Ignoring unreadable history file ${this.filePath}: ${errorMessage(error)}`
            );
            return EMPTY_HISTORY_LOG;
        }
    }

    save(log: HistoryLog): void {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        const tmpPath = `${this.filePath}.tmp`;
        fs.writeFileSync(tmpPath, `${JSON.stringify(log, null, 2)}\n`, "utf8");
        fs.renameSync(tmpPath, this.filePath);
    }
}

function isMissingFile(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "ENOENT"
    );
}

export interface HistoryTrackerOptions {
    capacity?: number;
    now?: () => Date;
}

/** Bounded recent-search log: newest first, one entry per artist. */
export class HistoryTracker {
    private readonly capacity: number;
    private readonly now: () => Date;

    constructor(
        private readonly store: HistoryStore,
        options: HistoryTrackerOptions = {}
    ) {
        this.capacity = options.capacity ?? HISTORY_CAPACITY;
        if (!Number.isInteger(this.capacity) || this.capacity <= 0) {
            throw new RangeError("History capacity must be a positive integer");
        }
        this.now = options.now ?? (() => new Date());
    }

    record(artistId: string, artistName: string): HistoryLog {
        return this.recordEntry({
            artistId,
            artistName,
            analyzedAt: this.now().toISOString(),
        });
    }

    /** Records an entry produced elsewhere, e.g. by a completed analysis. */
    recordEntry(entry: HistoryEntry): HistoryLog {
        const next = recordHistoryEntry(this.store.load(), entry, this.capacity);
        this.store.save(next);
        return next;
    }

    list(): HistoryLog {
        return this.store.load();
    }

    clear(): HistoryLog {
        this.store.save(EMPTY_HISTORY_LOG);
        return EMPTY_HISTORY_LOG;
    }
}
