import { formatNumber, renderTemplate, validateTemplate, buildTemplateContext } from "../template";
import { NEUTRAL_STATS } from "../../featureAggregator";
import { scoreComplexity } from "../../complexityScorer";
import { scoreMood } from "../../moodScorer";
import { makeArtist, makeStats } from "../../__tests__/fixtures";

describe("persona templates", () => {
    it("formats numbers per placeholder format", () => {
        expect(formatNumber(0.823, "pct")).toBe("82%");
        expect(formatNumber(127.6, "int")).toBe("128");
        expect(formatNumber(4, "fixed1")).toBe("4.0");
        expect(formatNumber(0.1234, "fixed2")).toBe("0.12");
        expect(formatNumber(1234567, "compact")).toBe("1.2M");
        expect(formatNumber(12)).toBe("12");
        expect(formatNumber(0.456)).toBe("0.46");
    });

    it("reports unknown placeholders and misplaced formats", () => {
        expect(validateTemplate("{artist} at {energy:pct}")).toEqual([]);
        expect(validateTemplate("{artist:pct}")).toEqual([
            "{artist:pct}: text placeholders take no format",
        ]);
        expect(validateTemplate("{energy:loud}")).toEqual(['{energy:loud}: unknown format "loud"']);
        expect(validateTemplate("{vibes}")).toEqual(['{vibes}: unknown placeholder "vibes"']);
    });

    it("renders text and numeric placeholders from the subject", () => {
        const stats = makeStats({ meanEnergy: 0.9, meanValence: 0.85, meanAcousticness: 0.1, meanTempo: 124 });
        const artist = makeArtist({
            name: "Test Artist",
            genres: ["dance pop", "pop", "electropop", "synthpop"],
            followers: 2500,
        });
        const context = buildTemplateContext({
            artist,
            stats,
            mood: scoreMood(stats),
            complexity: scoreComplexity(stats, artist.genres),
        });

        expect(
            renderTemplate("{artist} ({genreList}) feels {moodLower}, {tempo:int} BPM, {followers:compact} fans", context)
        ).toBe("Test Artist (dance pop, pop, electropop) feels energetic, 124 BPM, 2.5K fans");
    });

    it("uses fallbacks for artists without genres", () => {
        const artist = makeArtist({ genres: [] });
        const context = buildTemplateContext({
            artist,
            stats: NEUTRAL_STATS,
            mood: scoreMood(NEUTRAL_STATS),
            complexity: scoreComplexity(NEUTRAL_STATS, []),
        });

        expect(renderTemplate("{primaryGenre} / {genreList}", context)).toBe(
            "genre-fluid / no listed genres"
        );
    });
});
