import type { AggregateStats, TrackFeatures } from "@artistlens/insight-contract";

type FeatureDimension = Exclude<keyof TrackFeatures, "trackId">;

export const NEUTRAL_UNIT_MEAN = 0.5;
export const NEUTRAL_TEMPO = 120;

/**
 * Stats used when no track features are available. Scorers check
 * `trackCount === 0` and treat these as "insufficient data".
 */
export const NEUTRAL_STATS: AggregateStats = Object.freeze({
    trackCount: 0,
    meanEnergy: NEUTRAL_UNIT_MEAN,
    meanDanceability: NEUTRAL_UNIT_MEAN,
    meanValence: NEUTRAL_UNIT_MEAN,
    meanAcousticness: NEUTRAL_UNIT_MEAN,
    meanInstrumentalness: NEUTRAL_UNIT_MEAN,
    meanTempo: NEUTRAL_TEMPO,
    stdDevEnergy: 0,
    stdDevDanceability: 0,
    stdDevValence: 0,
    stdDevAcousticness: 0,
    stdDevInstrumentalness: 0,
    stdDevTempo: 0,
});

function mean(values: number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Population standard deviation. */
function stdDev(values: number[], average: number): number {
    if (values.length < 2) {
        return 0;
    }
    const variance =
        values.reduce((sum, value) => sum + (value - average) ** 2, 0) / values.length;
    return Math.sqrt(variance);
}

function summarize(tracks: readonly TrackFeatures[], dimension: FeatureDimension) {
    const values = tracks.map((track) => track[dimension]);
    const average = mean(values);
    return { mean: average, stdDev: stdDev(values, average) };
}

export function aggregateFeatures(tracks: readonly TrackFeatures[]): AggregateStats {
    if (tracks.length === 0) {
        return NEUTRAL_STATS;
    }

    const energy = summarize(tracks, "energy");
    const danceability = summarize(tracks, "danceability");
    const valence = summarize(tracks, "valence");
    const acousticness = summarize(tracks, "acousticness");
    const instrumentalness = summarize(tracks, "instrumentalness");
    const tempo = summarize(tracks, "tempo");

    return Object.freeze({
        trackCount: tracks.length,
        meanEnergy: energy.mean,
        meanDanceability: danceability.mean,
        meanValence: valence.mean,
        meanAcousticness: acousticness.mean,
        meanInstrumentalness: instrumentalness.mean,
        meanTempo: tempo.mean,
        stdDevEnergy: energy.stdDev,
        stdDevDanceability: danceability.stdDev,
        stdDevValence: valence.stdDev,
        stdDevAcousticness: acousticness.stdDev,
        stdDevInstrumentalness: instrumentalness.stdDev,
        stdDevTempo: tempo.stdDev,
    });
}
