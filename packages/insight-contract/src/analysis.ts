/**
 * Mood vocabulary. Declaration order doubles as the tie-break priority when
 * two labels sit at exactly the same distance from an artist's profile.
 */
export const MOOD_LABELS = [
    "Energetic",
    "Euphoric",
    "Intense",
    "Balanced",
    "Peaceful",
    "Melancholic",
    "Contemplative",
] as const;

export type MoodLabel = (typeof MOOD_LABELS)[number];

export interface ArtistRef {
    readonly id: string;
    readonly name: string;
    readonly genres: readonly string[];
    readonly popularity: number;
    readonly followers: number;
    readonly imageUrl: string | null;
}

export interface TrackFeatures {
    trackId: string;
    energy: number;
    danceability: number;
    valence: number;
    acousticness: number;
    instrumentalness: number;
    /** Beats per minute. */
    tempo: number;
}

export interface AggregateStats {
    readonly trackCount: number;
    readonly meanEnergy: number;
    readonly meanDanceability: number;
    readonly meanValence: number;
    readonly meanAcousticness: number;
    readonly meanInstrumentalness: number;
    readonly meanTempo: number;
    readonly stdDevEnergy: number;
    readonly stdDevDanceability: number;
    readonly stdDevValence: number;
    readonly stdDevAcousticness: number;
    readonly stdDevInstrumentalness: number;
    readonly stdDevTempo: number;
}

export type AggregateStatField = Exclude<keyof AggregateStats, "trackCount">;

export interface MoodProfile {
    label: MoodLabel;
    confidence: number;
    runnerUp: MoodLabel | null;
    insufficientData: boolean;
}

export type ComplexityFactorName =
    | "acousticness"
    | "inverseDanceability"
    | "tempoVariance"
    | "genreDiversity";

export interface ComplexityFactor {
    name: ComplexityFactorName;
    weight: number;
    /** Factor input normalized to [0, 1]. */
    normalized: number;
    contribution: number;
}

export interface ComplexityScore {
    value: number;
    factors: ComplexityFactor[];
    insufficientData: boolean;
}

export interface PersonaInsight {
    personaId: string;
    personaName: string;
    narrative: string;
    tags: string[];
}

export interface AlbumSummary {
    id: string;
    name: string;
    releaseDate: string | null;
    totalTracks: number;
    imageUrl: string | null;
}

export type CareerTrend = "Evolving" | "Stable" | "Unknown";

export interface DiscoveryInsights {
    title: string;
    primaryGenre: string | null;
    genreDiversity: number;
    mainstreamAppeal: number;
    discoverability: number;
    uniqueness: number;
    trend: CareerTrend;
    recommendations: string[];
}

export interface DataQuality {
    partial: boolean;
    requestedTracks: number;
    analyzedTracks: number;
    missingTrackIds: string[];
    reason: string | null;
}

export interface AnalysisResult {
    artist: ArtistRef;
    stats: AggregateStats;
    mood: MoodProfile;
    complexity: ComplexityScore;
    insights: PersonaInsight[];
    discovery: DiscoveryInsights;
    albums: AlbumSummary[];
    dataQuality: DataQuality;
    analyzedAt: string;
}
