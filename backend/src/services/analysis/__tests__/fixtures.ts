import type {
    AggregateStats,
    AlbumSummary,
    ArtistRef,
    TrackFeatures,
} from "@artistlens/insight-contract";
import { NEUTRAL_STATS } from "../featureAggregator";

export function makeArtist(overrides: Partial<ArtistRef> = {}): ArtistRef {
    return {
        id: "artist-1",
        name: "Test Artist",
        genres: [],
        popularity: 50,
        followers: 1000,
        imageUrl: null,
        ...overrides,
    };
}

export function makeTrack(trackId: string, overrides: Partial<TrackFeatures> = {}): TrackFeatures {
    return {
        trackId,
        energy: 0.5,
        danceability: 0.5,
        valence: 0.5,
        acousticness: 0.5,
        instrumentalness: 0,
        tempo: 120,
        ...overrides,
    };
}

/** Stats for an artist with analyzed tracks; unspecified means are neutral. */
export function makeStats(overrides: Partial<AggregateStats> = {}): AggregateStats {
    return { ...NEUTRAL_STATS, trackCount: 10, ...overrides };
}

export function makeAlbum(id: string, releaseDate: string | null): AlbumSummary {
    return { id, name: `Album ${id}`, releaseDate, totalTracks: 10, imageUrl: null };
}
