import type { PersonaSubject } from "./types";

export const TEMPLATE_FORMATS = ["pct", "int", "fixed1", "fixed2", "compact"] as const;
export type TemplateFormat = (typeof TEMPLATE_FORMATS)[number];

export const TEXT_PLACEHOLDERS = [
    "artist",
    "primaryGenre",
    "genreList",
    "mood",
    "moodLower",
    "runnerUp",
] as const;

export const NUMERIC_PLACEHOLDERS = [
    "genreCount",
    "popularity",
    "followers",
    "trackCount",
    "confidence",
    "complexity",
    "energy",
    "danceability",
    "valence",
    "acousticness",
    "instrumentalness",
    "tempo",
    "tempoSpread",
    "energySpread",
] as const;

type TextPlaceholder = (typeof TEXT_PLACEHOLDERS)[number];
type NumericPlaceholder = (typeof NUMERIC_PLACEHOLDERS)[number];

export interface TemplateContext {
    text: Record<TextPlaceholder, string>;
    numbers: Record<NumericPlaceholder, number>;
}

const PLACEHOLDER_PATTERN = /\{([a-zA-Z]+)(?::([a-zA-Z0-9]+))?\}/g;

const isTextPlaceholder = (name: string): name is TextPlaceholder =>
    (TEXT_PLACEHOLDERS as readonly string[]).includes(name);

const isNumericPlaceholder = (name: string): name is NumericPlaceholder =>
    (NUMERIC_PLACEHOLDERS as readonly string[]).includes(name);

const isTemplateFormat = (name: string): name is TemplateFormat =>
    (TEMPLATE_FORMATS as readonly string[]).includes(name);

const compactFormatter = new Intl.NumberFormat("en-US", {
    notation: "compact",
    maximumFractionDigits: 1,
});

export function formatNumber(value: number, format?: TemplateFormat): string {
    switch (format) {
        case "pct":
            return `${Math.round(value * 100)}%`;
        case "int":
            return String(Math.round(value));
        case "fixed1":
            return value.toFixed(1);
        case "fixed2":
            return value.toFixed(2);
        case "compact":
            return compactFormatter.format(value);
        case undefined:
            return Number.isInteger(value) ? String(value) : value.toFixed(2);
    }
}

/**
 * Lists problems with a template: unknown placeholders, unknown formats and
 * formats applied to text. An empty list means the template is renderable.
 */
export function validateTemplate(template: string): string[] {
    const problems: string[] = [];
    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
        const [token, name, format] = match;
        if (isTextPlaceholder(name)) {
            if (format !== undefined) {
                problems.push(`${token}: text placeholders take no format`);
            }
        } else if (isNumericPlaceholder(name)) {
            if (format !== undefined && !isTemplateFormat(format)) {
                problems.push(`${token}: unknown format "${format}"`);
            }
        } else {
            problems.push(`${token}: unknown placeholder "${name}"`);
        }
    }
    return problems;
}

export function buildTemplateContext(subject: PersonaSubject): TemplateContext {
    const { artist, stats, mood, complexity } = subject;
    return {
        text: {
            artist: artist.name,
            primaryGenre: artist.genres[0] ?? "genre-fluid",
            genreList: artist.genres.length > 0 ? artist.genres.slice(0, 3).join(", ") : "no listed genres",
            mood: mood.label,
            moodLower: mood.label.toLowerCase(),
            runnerUp: mood.runnerUp ?? "none",
        },
        numbers: {
            genreCount: artist.genres.length,
            popularity: artist.popularity,
            followers: artist.followers,
            trackCount: stats.trackCount,
            confidence: mood.confidence,
            complexity: complexity.value,
            energy: stats.meanEnergy,
            danceability: stats.meanDanceability,
            valence: stats.meanValence,
            acousticness: stats.meanAcousticness,
            instrumentalness: stats.meanInstrumentalness,
            tempo: stats.meanTempo,
            tempoSpread: stats.stdDevTempo,
            energySpread: stats.stdDevEnergy,
        },
    };
}

/** Substitutes `{name}` and `{name:format}` tokens. Templates are validated at load. */
export function renderTemplate(template: string, context: TemplateContext): string {
    return template.replace(
        PLACEHOLDER_PATTERN,
        (token: string, name: string, format: string | undefined) => {
            if (isTextPlaceholder(name)) {
                return context.text[name];
            }
            if (isNumericPlaceholder(name)) {
                return formatNumber(
                    context.numbers[name],
                    format !== undefined && isTemplateFormat(format) ? format : undefined
                );
            }
            return token;
        }
    );
}
