import { compare, evaluatePredicate, isPersonaActive } from "../predicates";
import type { PersonaSubject } from "../types";
import { NEUTRAL_STATS } from "../../featureAggregator";
import { makeArtist, makeStats } from "../../__tests__/fixtures";

function subject(overrides: Partial<PersonaSubject> = {}): PersonaSubject {
    return {
        artist: makeArtist({ genres: ["uk garage", "deep house"], popularity: 64 }),
        stats: makeStats({ meanEnergy: 0.72 }),
        mood: { label: "Energetic", confidence: 0.66, runnerUp: "Euphoric", insufficientData: false },
        complexity: { value: 42.5, factors: [], insufficientData: false },
        ...overrides,
    };
}

describe("persona predicates", () => {
    it("compares finite values only", () => {
        expect(compare(2, "gt", 1)).toBe(true);
        expect(compare(1, "gte", 1)).toBe(true);
        expect(compare(1, "lt", 1)).toBe(false);
        expect(compare(1, "lte", 1)).toBe(true);
        expect(compare(Number.NaN, "lt", 1)).toBe(false);
    });

    it("matches genre terms as substrings of any listed genre", () => {
        expect(evaluatePredicate({ kind: "genre", anyOf: ["house"] }, subject())).toBe(true);
        expect(evaluatePredicate({ kind: "genre", anyOf: ["techno", "garage"] }, subject())).toBe(true);
        expect(evaluatePredicate({ kind: "genre", anyOf: ["jazz"] }, subject())).toBe(false);
    });

    it("skips genres that contain an excluded term", () => {
        const dubstep = subject({ artist: makeArtist({ genres: ["dubstep", "brostep"] }) });
        const dub = subject({ artist: makeArtist({ genres: ["dub", "dubstep"] }) });
        const trigger = { kind: "genre", anyOf: ["dub"], noneOf: ["dubstep"] } as const;

        expect(evaluatePredicate(trigger, dubstep)).toBe(false);
        expect(evaluatePredicate(trigger, dub)).toBe(true);
    });

    it("evaluates stat, mood and numeric triggers", () => {
        expect(
            evaluatePredicate({ kind: "stat", field: "meanEnergy", op: "gt", value: 0.7 }, subject())
        ).toBe(true);
        expect(evaluatePredicate({ kind: "mood", anyOf: ["Intense", "Energetic"] }, subject())).toBe(true);
        expect(evaluatePredicate({ kind: "complexity", op: "lt", value: 40 }, subject())).toBe(false);
        expect(evaluatePredicate({ kind: "confidence", op: "gte", value: 0.66 }, subject())).toBe(true);
        expect(evaluatePredicate({ kind: "popularity", op: "gt", value: 70 }, subject())).toBe(false);
        expect(evaluatePredicate({ kind: "genreCount", op: "gte", value: 2 }, subject())).toBe(true);
        expect(evaluatePredicate({ kind: "trackCount", op: "gte", value: 10 }, subject())).toBe(true);
    });

    it("keeps feature-derived triggers inactive without analyzed tracks", () => {
        const empty = subject({
            stats: NEUTRAL_STATS,
            mood: { label: "Balanced", confidence: 0.1, runnerUp: "Euphoric", insufficientData: true },
            complexity: { value: 50, factors: [], insufficientData: true },
        });

        expect(
            evaluatePredicate({ kind: "stat", field: "meanEnergy", op: "lt", value: 1 }, empty)
        ).toBe(false);
        expect(evaluatePredicate({ kind: "mood", anyOf: ["Balanced"] }, empty)).toBe(false);
        expect(evaluatePredicate({ kind: "complexity", op: "gte", value: 0 }, empty)).toBe(false);
        expect(evaluatePredicate({ kind: "trackCount", op: "lte", value: 0 }, empty)).toBe(true);
    });

    it("requires every trigger and treats no triggers as always active", () => {
        expect(isPersonaActive([], subject())).toBe(true);
        expect(
            isPersonaActive(
                [
                    { kind: "genre", anyOf: ["house"] },
                    { kind: "popularity", op: "gt", value: 90 },
                ],
                subject()
            )
        ).toBe(false);
    });
});
