import type { Comparison, PersonaPredicate, PersonaSubject } from "./types";

export function compare(actual: number, op: Comparison, expected: number): boolean {
    if (!Number.isFinite(actual)) {
        return false;
    }
    switch (op) {
        case "gt":
            return actual > expected;
        case "gte":
            return actual >= expected;
        case "lt":
            return actual < expected;
        case "lte":
            return actual <= expected;
    }
}

/**
 * Evaluates one trigger. Stat, mood and complexity triggers never hold when
 * the subject has no analyzed tracks: those values are placeholders then.
 */
export function evaluatePredicate(
    predicate: PersonaPredicate,
    subject: PersonaSubject
): boolean {
    const { artist, stats, mood, complexity } = subject;
    const hasTracks = stats.trackCount > 0;

    switch (predicate.kind) {
        case "genre":
            return artist.genres.some(
                (genre) =>
                    predicate.anyOf.some((term) => genre.includes(term)) &&
                    !(predicate.noneOf ?? []).some((term) => genre.includes(term))
            );
        case "stat":
            return hasTracks && compare(stats[predicate.field], predicate.op, predicate.value);
        case "mood":
            return !mood.insufficientData && predicate.anyOf.includes(mood.label);
        case "complexity":
            return (
                !complexity.insufficientData &&
                compare(complexity.value, predicate.op, predicate.value)
            );
        case "confidence":
            return compare(mood.confidence, predicate.op, predicate.value);
        case "popularity":
            return compare(artist.popularity, predicate.op, predicate.value);
        case "trackCount":
            return compare(stats.trackCount, predicate.op, predicate.value);
        case "genreCount":
            return compare(artist.genres.length, predicate.op, predicate.value);
    }
}

/** A persona without triggers is always active. */
export function isPersonaActive(
    triggers: readonly PersonaPredicate[],
    subject: PersonaSubject
): boolean {
    return triggers.every((predicate) => evaluatePredicate(predicate, subject));
}
