import {
    artistTitle,
    buildDiscoveryInsights,
    careerTrend,
    discoverability,
    listeningRecommendations,
    mainstreamAppeal,
    uniqueness,
} from "../discoveryInsights";
import { NEUTRAL_STATS } from "../featureAggregator";
import { makeAlbum, makeArtist, makeStats } from "./fixtures";

describe("discoveryInsights", () => {
    it("titles artists by their primary genre", () => {
        expect(artistTitle(makeArtist({ genres: ["dance pop", "pop"] }))).toBe("Pop Sensation");
        expect(artistTitle(makeArtist({ genres: ["conscious hip hop"] }))).toBe("Hip-Hop Artist");
        expect(artistTitle(makeArtist({ genres: ["neo soul"] }))).toBe("R&B Star");
        expect(artistTitle(makeArtist({ genres: ["zydeco"] }))).toBe("Musical Artist");
        expect(artistTitle(makeArtist({ genres: [] }))).toBe("Musical Artist");
    });

    it("blends audio features and popularity into mainstream appeal", () => {
        const artist = makeArtist({ popularity: 80 });
        const stats = makeStats({ meanDanceability: 0.8, meanEnergy: 0.9, meanValence: 0.9 });

        expect(mainstreamAppeal(artist, stats)).toBe(85);
        expect(mainstreamAppeal(makeArtist({ popularity: 90 }), NEUTRAL_STATS)).toBe(100);
        expect(mainstreamAppeal(makeArtist({ popularity: 40 }), NEUTRAL_STATS)).toBe(48);
    });

    it("keeps discoverability between 30 and 100", () => {
        expect(discoverability(makeArtist({ popularity: 80, genres: ["pop"] }))).toBe(100);
        expect(discoverability(makeArtist({ popularity: 50, genres: ["zydeco"] }))).toBe(65);
        expect(discoverability(makeArtist({ popularity: 5, genres: [] }))).toBe(30);
    });

    it("rewards instrumental and leftfield catalogs with uniqueness", () => {
        const artist = makeArtist({ genres: ["experimental"] });

        expect(uniqueness(artist, makeStats({ meanInstrumentalness: 0.8 }))).toBe(90);
        expect(uniqueness(artist, NEUTRAL_STATS)).toBe(70);
        expect(uniqueness(makeArtist(), makeStats({ meanInstrumentalness: 0 }))).toBe(50);
    });

    it("reads a career trend from album release years", () => {
        expect(careerTrend([makeAlbum("a", "2010-05-01"), makeAlbum("b", "2020")])).toBe("Evolving");
        expect(careerTrend([makeAlbum("a", "2018-01-01"), makeAlbum("b", "2021-03")])).toBe("Stable");
        expect(careerTrend([makeAlbum("a", null)])).toBe("Unknown");
        expect(careerTrend([])).toBe("Unknown");
    });

    it("suggests at most three listening contexts", () => {
        expect(
            listeningRecommendations(
                makeStats({ meanEnergy: 0.9, meanDanceability: 0.8, meanValence: 0.9, meanAcousticness: 0.7 })
            )
        ).toEqual([
            "Built for workout playlists and dance parties.",
            "Reliable mood-boosting music.",
            "An acoustic sound for intimate settings.",
        ]);
        expect(listeningRecommendations(makeStats())).toEqual([
            "Versatile music for most listening contexts.",
        ]);
        expect(listeningRecommendations(NEUTRAL_STATS)).toEqual([
            "Explore more of the catalog to get listening recommendations.",
        ]);
    });

    it("assembles the full discovery block", () => {
        const insights = buildDiscoveryInsights(
            makeArtist({ popularity: 50, genres: ["indie folk", "chamber pop"] }),
            makeStats(),
            [makeAlbum("a", "2015-01-01")]
        );

        expect(insights).toEqual({
            title: "Indie Artist",
            primaryGenre: "indie folk",
            genreDiversity: 2,
            mainstreamAppeal: 50,
            discoverability: 75,
            uniqueness: 63,
            trend: "Stable",
            recommendations: ["Versatile music for most listening contexts."],
        });
    });
});
