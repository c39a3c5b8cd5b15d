import type {
    AlbumSummary,
    ArtistRef,
    TrackFeatures,
} from "@artistlens/insight-contract";

export interface CatalogCallOptions {
    signal?: AbortSignal;
}

/**
 * Outcome of a top-track lookup. `partial` marks a degraded-but-usable
 * result: the provider denied or omitted features for `missingTrackIds`.
 */
export interface TrackFetchResult {
    tracks: TrackFeatures[];
    requestedTrackIds: string[];
    missingTrackIds: string[];
    partial: boolean;
    reason: string | null;
}

export interface CatalogClient {
    /** Resolves the best match for `name`, or null when the provider has none. */
    fetchArtist(name: string, options?: CatalogCallOptions): Promise<ArtistRef | null>;
    fetchTopTracks(artistId: string, options?: CatalogCallOptions): Promise<TrackFetchResult>;
    /** Best effort; provider failures yield an empty list. */
    fetchAlbums(artistId: string, options?: CatalogCallOptions): Promise<AlbumSummary[]>;
    /** True when the provider accepts our credentials right now. */
    ping(options?: CatalogCallOptions): Promise<boolean>;
}

export const TEMPO_RANGE = { min: 0, max: 250 } as const;

export function clampUnit(value: number): number {
    if (!Number.isFinite(value)) {
        return 0.5;
    }
    return Math.min(1, Math.max(0, value));
}

export function clampTempo(value: number): number {
    if (!Number.isFinite(value)) {
        return (TEMPO_RANGE.min + TEMPO_RANGE.max) / 2;
    }
    return Math.min(TEMPO_RANGE.max, Math.max(TEMPO_RANGE.min, value));
}

export interface RawTrackFeatures {
    id: string;
    energy: number;
    danceability: number;
    valence: number;
    acousticness: number;
    instrumentalness: number;
    tempo: number;
}

export function normalizeTrackFeatures(raw: RawTrackFeatures): TrackFeatures {
    return {
        trackId: raw.id,
        energy: clampUnit(raw.energy),
        danceability: clampUnit(raw.danceability),
        valence: clampUnit(raw.valence),
        acousticness: clampUnit(raw.acousticness),
        instrumentalness: clampUnit(raw.instrumentalness),
        tempo: clampTempo(raw.tempo),
    };
}

export interface RawArtist {
    id: string;
    name: string;
    genres: string[];
    popularity: number;
    followers: number | null;
    imageUrl: string | null;
}

/** Genres become a lowercase, deduplicated list; the result is frozen. */
export function normalizeArtist(raw: RawArtist): ArtistRef {
    const genres: string[] = [];
    for (const genre of raw.genres) {
        const normalized = genre.trim().toLowerCase();
        if (normalized && !genres.includes(normalized)) {
            genres.push(normalized);
        }
    }

    const popularity = Number.isFinite(raw.popularity)
        ? Math.round(Math.min(100, Math.max(0, raw.popularity)))
        : 0;
    const followers =
        raw.followers !== null && Number.isFinite(raw.followers)
            ? Math.max(0, Math.round(raw.followers))
            : 0;

    return Object.freeze({
        id: raw.id,
        name: raw.name.trim(),
        genres: Object.freeze(genres),
        popularity,
        followers,
        imageUrl: raw.imageUrl,
    });
}
