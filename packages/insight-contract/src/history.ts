export const HISTORY_CAPACITY = 20;

export interface HistoryEntry {
    artistName: string;
    artistId: string;
    /** ISO-8601 timestamp of the search that produced the entry. */
    analyzedAt: string;
}

/** Newest first, unique by artistId. */
export type HistoryLog = readonly HistoryEntry[];

export const EMPTY_HISTORY_LOG: HistoryLog = Object.freeze([]);

const normalizeString = (value: unknown): string | undefined => {
    if (typeof value !== "string") {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

const normalizeTimestamp = (value: unknown): string | undefined => {
    const raw = normalizeString(value);
    if (!raw) {
        return undefined;
    }
    const parsed = Date.parse(raw);
    return Number.isNaN(parsed) ? undefined : new Date(parsed).toISOString();
};

export const normalizeHistoryEntry = (value: unknown): HistoryEntry | null => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return null;
    }
    const record: object = value;
    const field = (key: keyof HistoryEntry): unknown =>
        key in record ? Reflect.get(record, key) : undefined;
    const artistId = normalizeString(field("artistId"));
    const artistName = normalizeString(field("artistName"));
    const analyzedAt = normalizeTimestamp(field("analyzedAt"));
    if (!artistId || !artistName || !analyzedAt) {
        return null;
    }
    return { artistId, artistName, analyzedAt };
};

/**
 * Moves (or inserts) the entry at the front, drops any older entry for the
 * same artist and evicts from the tail beyond `capacity`.
 */
export const recordHistoryEntry = (
    log: HistoryLog,
    entry: HistoryEntry,
    capacity: number = HISTORY_CAPACITY,
): HistoryLog => {
    if (!Number.isInteger(capacity) || capacity <= 0) {
        throw new RangeError("History capacity must be a positive integer");
    }
    const rest = log.filter((existing) => existing.artistId !== entry.artistId);
    return Object.freeze([{ ...entry }, ...rest].slice(0, capacity));
};

/**
 * Rebuilds a log from persisted data of unknown shape. Entries are sorted
 * newest first; the newest entry wins for each artistId.
 */
export const normalizeHistoryLog = (
    value: unknown,
    capacity: number = HISTORY_CAPACITY,
): HistoryLog => {
    if (!Array.isArray(value)) {
        return EMPTY_HISTORY_LOG;
    }

    const entries = value
        .map((item, index) => ({ entry: normalizeHistoryEntry(item), index }))
        .filter(
            (candidate): candidate is { entry: HistoryEntry; index: number } =>
                candidate.entry !== null,
        )
        .sort((a, b) => {
            const byTime =
                Date.parse(b.entry.analyzedAt) - Date.parse(a.entry.analyzedAt);
            return byTime !== 0 ? byTime : a.index - b.index;
        });

    const seen = new Set<string>();
    const deduped: HistoryEntry[] = [];
    for (const { entry } of entries) {
        if (seen.has(entry.artistId)) {
            continue;
        }
        seen.add(entry.artistId);
        deduped.push(entry);
    }

    return Object.freeze(deduped.slice(0, capacity));
};
