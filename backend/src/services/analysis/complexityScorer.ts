import type {
    AggregateStats,
    ComplexityFactor,
    ComplexityFactorName,
    ComplexityScore,
} from "@artistlens/insight-contract";

export const NEUTRAL_COMPLEXITY = 50;

// A tempo spread of 40 BPM or more across top tracks counts as fully varied
const TEMPO_SPREAD_CEILING = 40;
// Five or more distinct genres counts as fully diverse
const GENRE_COUNT_CEILING = 5;

/**
 * Factor weights, in declaration order. They sum to 100 so a catalog that
 * maxes every factor scores 100.
 */
export const COMPLEXITY_WEIGHTS: ReadonlyArray<{ name: ComplexityFactorName; weight: number }> =
    Object.freeze([
        { name: "acousticness", weight: 30 },
        { name: "inverseDanceability", weight: 25 },
        { name: "tempoVariance", weight: 20 },
        { name: "genreDiversity", weight: 25 },
    ]);

function unit(value: number): number {
    if (!Number.isFinite(value)) {
        return 0;
    }
    return Math.min(1, Math.max(0, value));
}

function normalizedFactor(
    name: ComplexityFactorName,
    stats: AggregateStats,
    genres: readonly string[]
): number {
    switch (name) {
        case "acousticness":
            return unit(stats.meanAcousticness);
        case "inverseDanceability":
            return Number.isFinite(stats.meanDanceability)
                ? unit(1 - stats.meanDanceability)
                : 0;
        case "tempoVariance":
            return unit(stats.stdDevTempo / TEMPO_SPREAD_CEILING);
        case "genreDiversity":
            return unit(new Set(genres).size / GENRE_COUNT_CEILING);
    }
}

const round1 = (value: number) => Math.round(value * 10) / 10;

export function scoreComplexity(
    stats: AggregateStats,
    genres: readonly string[]
): ComplexityScore {
    if (stats.trackCount === 0) {
        return {
            value: NEUTRAL_COMPLEXITY,
            factors: COMPLEXITY_WEIGHTS.map(({ name, weight }) => ({
                name,
                weight,
                normalized: 0,
                contribution: 0,
            })),
            insufficientData: true,
        };
    }

    const factors: ComplexityFactor[] = COMPLEXITY_WEIGHTS.map(({ name, weight }) => {
        const normalized = normalizedFactor(name, stats, genres);
        return {
            name,
            weight,
            normalized: Math.round(normalized * 1000) / 1000,
            contribution: round1(normalized * weight),
        };
    });

    const total = factors.reduce(
        (sum, factor) => sum + factor.weight * normalizedFactor(factor.name, stats, genres),
        0
    );

    return {
        value: round1(Math.min(100, Math.max(0, total))),
        // stable sort: equal contributions keep declaration order
        factors: [...factors].sort((a, b) => b.contribution - a.contribution),
        insufficientData: false,
    };
}
