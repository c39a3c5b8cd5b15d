import type {
    AggregateStats,
    AlbumSummary,
    ArtistRef,
    CareerTrend,
    DiscoveryInsights,
} from "@artistlens/insight-contract";

const MAX_RECOMMENDATIONS = 3;
// Release years spread wider than this count as a changing career
const EVOLVING_SPAN_YEARS = 5;

const GENRE_TITLES: ReadonlyArray<{ terms: readonly string[]; title: string }> = [
    { terms: ["pop"], title: "Pop Sensation" },
    { terms: ["rap", "hip hop", "hip-hop"], title: "Hip-Hop Artist" },
    { terms: ["rock"], title: "Rock Legend" },
    { terms: ["r&b", "soul"], title: "R&B Star" },
    { terms: ["country"], title: "Country Artist" },
    { terms: ["electronic", "edm"], title: "Electronic Producer" },
    { terms: ["jazz"], title: "Jazz Virtuoso" },
    { terms: ["indie", "alternative"], title: "Indie Artist" },
];

const WIDE_REACH_GENRES = ["pop", "rock", "hip hop", "hip-hop", "indie", "electronic"];
const LEFTFIELD_GENRES = ["experimental", "avant-garde", "noise", "drone"];

const clampScore = (value: number, min = 0, max = 100) =>
    Math.round(Math.min(max, Math.max(min, value)));

const hasGenre = (artist: ArtistRef, terms: readonly string[]) =>
    artist.genres.some((genre) => terms.some((term) => genre.includes(term)));

/** A short epithet from the artist's first listed genre. */
export function artistTitle(artist: ArtistRef): string {
    const primary = artist.genres[0];
    if (!primary) {
        return "Musical Artist";
    }
    const match = GENRE_TITLES.find(({ terms }) => terms.some((term) => primary.includes(term)));
    return match?.title ?? "Musical Artist";
}

export function mainstreamAppeal(artist: ArtistRef, stats: AggregateStats): number {
    if (stats.trackCount === 0) {
        return clampScore(artist.popularity * 1.2);
    }
    return clampScore(
        stats.meanDanceability * 30 +
            stats.meanEnergy * 25 +
            stats.meanValence * 25 +
            artist.popularity * 0.2
    );
}

export function discoverability(artist: ArtistRef): number {
    const base = Math.min(Math.round(artist.popularity * 1.3), 95);
    const genreBoost = hasGenre(artist, WIDE_REACH_GENRES) ? 10 : 0;
    return clampScore(base + genreBoost, 30, 100);
}

export function uniqueness(artist: ArtistRef, stats: AggregateStats): number {
    const instrumental = stats.trackCount > 0 ? stats.meanInstrumentalness * 25 : 0;
    const leftfield = hasGenre(artist, LEFTFIELD_GENRES) ? 20 : 0;
    return clampScore(50 + instrumental + leftfield);
}

function releaseYear(album: AlbumSummary): number | null {
    const match = album.releaseDate?.match(/^(\d{4})/);
    return match ? Number.parseInt(match[1], 10) : null;
}

export function careerTrend(albums: readonly AlbumSummary[]): CareerTrend {
    const years = albums
        .map(releaseYear)
        .filter((year): year is number => year !== null);
    if (years.length === 0) {
        return "Unknown";
    }
    return Math.max(...years) - Math.min(...years) > EVOLVING_SPAN_YEARS
        ? "Evolving"
        : "Stable";
}

export function listeningRecommendations(stats: AggregateStats): string[] {
    if (stats.trackCount === 0) {
        return ["Explore more of the catalog to get listening recommendations."];
    }

    const recommendations: string[] = [];
    if (stats.meanEnergy > 0.7 && stats.meanDanceability > 0.7) {
        recommendations.push("Built for workout playlists and dance parties.");
    }
    if (stats.meanValence > 0.8) {
        recommendations.push("Reliable mood-boosting music.");
    }
    if (stats.meanEnergy < 0.3 && stats.meanValence < 0.5) {
        recommendations.push("Suited to introspective moments and late-night listening.");
    }
    if (stats.meanAcousticness > 0.6) {
        recommendations.push("An acoustic sound for intimate settings.");
    }
    if (recommendations.length === 0) {
        recommendations.push("Versatile music for most listening contexts.");
    }
    return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

export function buildDiscoveryInsights(
    artist: ArtistRef,
    stats: AggregateStats,
    albums: readonly AlbumSummary[]
): DiscoveryInsights {
    return {
        title: artistTitle(artist),
        primaryGenre: artist.genres[0] ?? null,
        genreDiversity: artist.genres.length,
        mainstreamAppeal: mainstreamAppeal(artist, stats),
        discoverability: discoverability(artist),
        uniqueness: uniqueness(artist, stats),
        trend: careerTrend(albums),
        recommendations: listeningRecommendations(stats),
    };
}
