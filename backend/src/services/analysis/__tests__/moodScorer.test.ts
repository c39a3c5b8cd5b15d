import {
    boundaryConfidence,
    INSUFFICIENT_DATA_CONFIDENCE,
    MOOD_CENTROIDS,
    rankMoods,
    scoreMood,
} from "../moodScorer";
import { NEUTRAL_STATS } from "../featureAggregator";
import { makeStats } from "./fixtures";

describe("moodScorer", () => {
    it("labels a loud, bright, electric profile as Energetic with high confidence", () => {
        const mood = scoreMood(
            makeStats({ meanEnergy: 0.9, meanValence: 0.85, meanAcousticness: 0.1 })
        );

        expect(mood.label).toBe("Energetic");
        expect(mood.runnerUp).toBe("Euphoric");
        expect(mood.insufficientData).toBe(false);
        expect(mood.confidence).toBeGreaterThan(0.6);
        expect(mood.confidence).toBe(0.805);
    });

    it("labels a quiet, dark, acoustic profile as Contemplative", () => {
        const mood = scoreMood(
            makeStats({ meanEnergy: 0.15, meanValence: 0.35, meanAcousticness: 0.9 })
        );

        expect(mood.label).toBe("Contemplative");
    });

    it("gives each centroid its own label", () => {
        for (const [label, point] of Object.entries(MOOD_CENTROIDS)) {
            const mood = scoreMood(
                makeStats({
                    meanEnergy: point.energy,
                    meanValence: point.valence,
                    meanAcousticness: point.acousticness,
                })
            );
            expect(mood.label).toBe(label);
            expect(mood.confidence).toBe(1);
        }
    });

    it("falls back to the floor confidence without tracks", () => {
        const mood = scoreMood(NEUTRAL_STATS);

        expect(mood.insufficientData).toBe(true);
        expect(mood.confidence).toBe(INSUFFICIENT_DATA_CONFIDENCE);
        expect(mood.label).toBe("Balanced");
    });

    it("scales confidence by feature coverage without dropping below the floor", () => {
        const stats = makeStats({ meanEnergy: 0.9, meanValence: 0.85, meanAcousticness: 0.1 });

        expect(scoreMood(stats, { coverage: 0.5 }).confidence).toBe(0.402);
        expect(scoreMood(stats, { coverage: 0 }).confidence).toBe(INSUFFICIENT_DATA_CONFIDENCE);
    });

    it("clamps out-of-range means into the unit cube", () => {
        const mood = scoreMood(
            makeStats({ meanEnergy: 1.7, meanValence: -0.4, meanAcousticness: 0.1 })
        );

        expect(mood.label).toBe("Intense");
    });

    it("breaks exact distance ties by vocabulary order", () => {
        const ranked = rankMoods(
            { energy: 0.5, valence: 0.5, acousticness: 0.5 },
            {
                Energetic: { energy: 0, valence: 0, acousticness: 0 },
                Euphoric: { energy: 0.5, valence: 0.5, acousticness: 0.75 },
                Intense: { energy: 0, valence: 0, acousticness: 0 },
                Balanced: { energy: 0.5, valence: 0.5, acousticness: 0.25 },
                Peaceful: { energy: 0, valence: 0, acousticness: 0 },
                Melancholic: { energy: 0, valence: 0, acousticness: 0 },
                Contemplative: { energy: 0, valence: 0, acousticness: 0 },
            }
        );

        expect(ranked[0].label).toBe("Euphoric");
        expect(ranked[1].label).toBe("Balanced");
        expect(ranked[2].label).toBe("Energetic");
    });

    it("computes boundary confidence from the two nearest distances", () => {
        expect(boundaryConfidence(0, 0.4)).toBe(1);
        expect(boundaryConfidence(0.2, 0.2)).toBe(0.5);
        expect(boundaryConfidence(0.1, 0.3)).toBeCloseTo(0.75, 10);
        expect(boundaryConfidence(0, 0)).toBe(0.5);
    });
});
