import type {
    AggregateStatField,
    AggregateStats,
    ArtistRef,
    ComplexityScore,
    MoodLabel,
    MoodProfile,
} from "@artistlens/insight-contract";

export const PERSONA_KINDS = ["genre", "technical", "mood", "complexity", "general"] as const;
export type PersonaKind = (typeof PERSONA_KINDS)[number];

export const COMPARISONS = ["gt", "gte", "lt", "lte"] as const;
export type Comparison = (typeof COMPARISONS)[number];

export const STAT_FIELDS = [
    "meanEnergy",
    "meanDanceability",
    "meanValence",
    "meanAcousticness",
    "meanInstrumentalness",
    "meanTempo",
    "stdDevEnergy",
    "stdDevDanceability",
    "stdDevValence",
    "stdDevAcousticness",
    "stdDevInstrumentalness",
    "stdDevTempo",
] as const satisfies readonly AggregateStatField[];

export type NumericSubject =
    | "complexity"
    | "confidence"
    | "popularity"
    | "trackCount"
    | "genreCount";

export type PersonaPredicate =
    /** `noneOf` rules out genres that contain a term by accident ("dub" in "dubstep"). */
    | { kind: "genre"; anyOf: readonly string[]; noneOf?: readonly string[] }
    | { kind: "stat"; field: AggregateStatField; op: Comparison; value: number }
    | { kind: "mood"; anyOf: readonly MoodLabel[] }
    | { kind: NumericSubject; op: Comparison; value: number };

export interface PersonaDefinition {
    id: string;
    name: string;
    kind: PersonaKind;
    tags: readonly string[];
    triggers: readonly PersonaPredicate[];
    template: string;
}

/** Everything a persona may look at; immutable for the duration of a request. */
export interface PersonaSubject {
    artist: ArtistRef;
    stats: AggregateStats;
    mood: MoodProfile;
    complexity: ComplexityScore;
}
