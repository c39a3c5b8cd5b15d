import { invalidInput } from "./errors";

export const MAX_QUERY_LENGTH = 100;

const CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]/g;
// Catalog search field filters such as `genre:` or `year:`
const FIELD_FILTERS = /\b(?:artist|album|track|genre|year|isrc|upc|tag)\s*:/gi;
const SEARCH_SYNTAX = /["*:\\]/g;
const BOOLEAN_OPERATORS = /\b(?:AND|OR|NOT)\b/g;

function assertWithinLimit(query: string): void {
    if (query.length > MAX_QUERY_LENGTH) {
        throw invalidInput(`Search query must be at most ${MAX_QUERY_LENGTH} characters`, {
            length: query.length,
        });
    }
}

/**
 * Turns user input into a plain artist-name query: no control characters,
 * no field filters, wildcards, quotes or boolean operators that the catalog
 * search would interpret. Throws InvalidInput when nothing usable is left or
 * the input is longer than MAX_QUERY_LENGTH.
 */
export function sanitizeArtistQuery(input: unknown): string {
    if (typeof input !== "string") {
        throw invalidInput("Search query must be a string");
    }

    const trimmed = input.trim();
    if (trimmed.length === 0) {
        throw invalidInput("Search query is required");
    }
    assertWithinLimit(trimmed);

    const sanitized = trimmed
        .normalize("NFKC")
        .replace(CONTROL_CHARS, " ")
        .replace(FIELD_FILTERS, " ")
        .replace(SEARCH_SYNTAX, " ")
        .replace(BOOLEAN_OPERATORS, (operator) => operator.toLowerCase())
        .replace(/^[-\s]+/, "")
        .replace(/\s+/g, " ")
        .trim();

    if (sanitized.length === 0) {
        throw invalidInput("Search query has no searchable characters");
    }
    // NFKC can expand a code point into several (U+FB03 becomes "ffi")
    assertWithinLimit(sanitized);
    return sanitized;
}
