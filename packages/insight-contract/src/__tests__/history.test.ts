import {
    EMPTY_HISTORY_LOG,
    HISTORY_CAPACITY,
    normalizeHistoryEntry,
    normalizeHistoryLog,
    recordHistoryEntry,
    type HistoryEntry,
    type HistoryLog,
} from "../history";

function entry(artistId: string, minute: number): HistoryEntry {
    return {
        artistId,
        artistName: `Artist ${artistId}`,
        analyzedAt: new Date(Date.UTC(2026, 0, 1, 0, minute)).toISOString(),
    };
}

describe("history log contract", () => {
    describe("recordHistoryEntry", () => {
        it("prepends new artists", () => {
            const log = recordHistoryEntry(
                recordHistoryEntry(EMPTY_HISTORY_LOG, entry("a", 1)),
                entry("b", 2),
            );

            expect(log.map((e) => e.artistId)).toEqual(["b", "a"]);
        });

        it("moves a repeated artist to the front instead of duplicating it", () => {
            let log: HistoryLog = EMPTY_HISTORY_LOG;
            log = recordHistoryEntry(log, entry("a", 1));
            log = recordHistoryEntry(log, entry("b", 2));
            log = recordHistoryEntry(log, entry("a", 3));

            expect(log.map((e) => e.artistId)).toEqual(["a", "b"]);
            expect(log[0].analyzedAt).toBe("2026-01-01T00:03:00.000Z");
        });

        it("evicts the oldest entry beyond capacity", () => {
            let log: HistoryLog = EMPTY_HISTORY_LOG;
            for (let i = 0; i < HISTORY_CAPACITY + 1; i++) {
                log = recordHistoryEntry(log, entry(`artist-${i}`, i));
            }

            expect(log).toHaveLength(20);
            expect(log[0].artistId).toBe("artist-20");
            expect(log.some((e) => e.artistId === "artist-0")).toBe(false);
        });

        it("does not mutate the previous log", () => {
            const before = recordHistoryEntry(EMPTY_HISTORY_LOG, entry("a", 1));
            recordHistoryEntry(before, entry("b", 2));

            expect(before.map((e) => e.artistId)).toEqual(["a"]);
        });

        it("rejects a non-positive capacity", () => {
            expect(() =>
                recordHistoryEntry(EMPTY_HISTORY_LOG, entry("a", 1), 0),
            ).toThrow("History capacity must be a positive integer");
        });
    });

    describe("normalizeHistoryEntry", () => {
        it("trims fields and canonicalizes the timestamp", () => {
            expect(
                normalizeHistoryEntry({
                    artistId: " id-1 ",
                    artistName: " Nova ",
                    analyzedAt: "2026-01-01T10:00:00Z",
                }),
            ).toEqual({
                artistId: "id-1",
                artistName: "Nova",
                analyzedAt: "2026-01-01T10:00:00.000Z",
            });
        });

        it("returns null for incomplete or malformed values", () => {
            expect(normalizeHistoryEntry(null)).toBeNull();
            expect(normalizeHistoryEntry(["a"])).toBeNull();
            expect(
                normalizeHistoryEntry({ artistId: "a", artistName: "" , analyzedAt: "2026-01-01" }),
            ).toBeNull();
            expect(
                normalizeHistoryEntry({ artistId: "a", artistName: "A", analyzedAt: "not a date" }),
            ).toBeNull();
        });
    });

    describe("normalizeHistoryLog", () => {
        it("returns an empty log for non-array input", () => {
            expect(normalizeHistoryLog({ entries: [] })).toEqual([]);
            expect(normalizeHistoryLog(undefined)).toEqual([]);
        });

        it("sorts newest first, drops malformed rows and keeps the newest duplicate", () => {
            const log = normalizeHistoryLog([
                entry("a", 1),
                { artistId: "broken" },
                entry("b", 5),
                entry("a", 9),
            ]);

            expect(log.map((e) => [e.artistId, e.analyzedAt])).toEqual([
                ["a", "2026-01-01T00:09:00.000Z"],
                ["b", "2026-01-01T00:05:00.000Z"],
            ]);
        });

        it("re-applies capacity", () => {
            const raw = Array.from({ length: 30 }, (_, i) => entry(`x-${i}`, i));

            const log = normalizeHistoryLog(raw, 5);

            expect(log.map((e) => e.artistId)).toEqual([
                "x-29",
                "x-28",
                "x-27",
                "x-26",
                "x-25",
            ]);
        });
    });
});
