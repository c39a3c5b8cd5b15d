import {
    MOOD_LABELS,
    type AggregateStats,
    type MoodLabel,
    type MoodProfile,
} from "@artistlens/insight-contract";

/** Confidence reported when no track features were available. */
export const INSUFFICIENT_DATA_CONFIDENCE = 0.1;

export interface MoodPoint {
    energy: number;
    valence: number;
    acousticness: number;
}

/*
 * Reference points in (energy, valence, acousticness) space. These are
 * editorial constants, placed at the centres of the regions the labels are
 * meant to describe.
 */
export const MOOD_CENTROIDS: Readonly<Record<MoodLabel, MoodPoint>> = Object.freeze({
    Energetic: { energy: 0.85, valence: 0.8, acousticness: 0.15 },
    Euphoric: { energy: 0.65, valence: 0.9, acousticness: 0.35 },
    Intense: { energy: 0.85, valence: 0.25, acousticness: 0.1 },
    Balanced: { energy: 0.5, valence: 0.5, acousticness: 0.4 },
    Peaceful: { energy: 0.25, valence: 0.75, acousticness: 0.65 },
    Melancholic: { energy: 0.3, valence: 0.2, acousticness: 0.5 },
    Contemplative: { energy: 0.2, valence: 0.4, acousticness: 0.85 },
});

export interface MoodScoringOptions {
    /**
     * Share of requested tracks that actually had features, in [0, 1].
     * Below 1 the confidence is scaled down accordingly.
     */
    coverage?: number;
}

function distance(a: MoodPoint, b: MoodPoint): number {
    return Math.sqrt(
        (a.energy - b.energy) ** 2 +
            (a.valence - b.valence) ** 2 +
            (a.acousticness - b.acousticness) ** 2
    );
}

function clamp01(value: number): number {
    if (Number.isNaN(value)) {
        return 0;
    }
    return Math.min(1, Math.max(0, value));
}

/** Labels by ascending distance; exact ties keep vocabulary order. */
export function rankMoods(
    point: MoodPoint,
    centroids: Readonly<Record<MoodLabel, MoodPoint>> = MOOD_CENTROIDS
): Array<{ label: MoodLabel; distance: number }> {
    return MOOD_LABELS.map((label, priority) => ({
        label,
        priority,
        distance: distance(point, centroids[label]),
    }))
        .sort((a, b) => a.distance - b.distance || a.priority - b.priority)
        .map(({ label, distance: d }) => ({ label, distance: d }));
}

/**
 * `1 - d1 / (d1 + d2)` where d1, d2 are the nearest and second-nearest
 * centroid distances. Equal distances give 0.5.
 */
export function boundaryConfidence(nearest: number, secondNearest: number): number {
    const total = nearest + secondNearest;
    if (!Number.isFinite(total) || total <= 0) {
        return 0.5;
    }
    return clamp01(1 - nearest / total);
}

export function scoreMood(
    stats: AggregateStats,
    options: MoodScoringOptions = {}
): MoodProfile {
    const point: MoodPoint = {
        energy: clamp01(stats.meanEnergy),
        valence: clamp01(stats.meanValence),
        acousticness: clamp01(stats.meanAcousticness),
    };
    const [nearest, second] = rankMoods(point);

    if (stats.trackCount === 0) {
        return {
            label: nearest.label,
            confidence: INSUFFICIENT_DATA_CONFIDENCE,
            runnerUp: second.label,
            insufficientData: true,
        };
    }

    const coverage = options.coverage === undefined ? 1 : clamp01(options.coverage);
    const confidence = Math.max(
        INSUFFICIENT_DATA_CONFIDENCE,
        boundaryConfidence(nearest.distance, second.distance) * coverage
    );

    return {
        label: nearest.label,
        confidence: Math.round(confidence * 1000) / 1000,
        runnerUp: second.label,
        insufficientData: false,
    };
}
