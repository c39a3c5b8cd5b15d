import type { PersonaInsight } from "@artistlens/insight-contract";
import type { PersonaLibrary } from "./library";
import { isPersonaActive } from "./predicates";
import { buildTemplateContext, renderTemplate } from "./template";
import type { PersonaDefinition, PersonaSubject } from "./types";

export const DEFAULT_MAX_INSIGHTS = 10;

export interface PersonaSelectorOptions {
    maxInsights?: number;
}

interface Candidate {
    persona: Readonly<PersonaDefinition>;
    order: number;
    alignment: number;
}

/**
 * How strongly the subject's scores back a mood or complexity specialist:
 * mood confidence for mood personas, distance of complexity from the neutral
 * midpoint for complexity personas.
 */
export function alignmentFor(
    persona: Readonly<PersonaDefinition>,
    subject: PersonaSubject
): number {
    switch (persona.kind) {
        case "mood":
            return subject.mood.confidence;
        case "complexity":
            return Math.min(1, Math.abs(subject.complexity.value - 50) / 50);
        case "genre":
        case "technical":
        case "general":
            return 0;
    }
}

/**
 * Picks and renders insights in a fixed order:
 *   1. every active genre/technical specialist, in library order
 *   2. active mood/complexity specialists by alignment, then library order
 *   3. general personas, in library order
 * truncated at `maxInsights`. The result depends only on the inputs.
 */
export class PersonaSelector {
    private readonly maxInsights: number;

    constructor(
        private readonly library: PersonaLibrary,
        options: PersonaSelectorOptions = {}
    ) {
        const max = options.maxInsights ?? DEFAULT_MAX_INSIGHTS;
        if (!Number.isInteger(max) || max <= 0) {
            throw new RangeError("maxInsights must be a positive integer");
        }
        this.maxInsights = max;
    }

    /** Active personas in selection order, before truncation. */
    rank(subject: PersonaSubject): Readonly<PersonaDefinition>[] {
        const active: Candidate[] = this.library.personas
            .map((persona, order) => ({ persona, order, alignment: 0 }))
            .filter(({ persona }) => isPersonaActive(persona.triggers, subject))
            .map((candidate) => ({
                ...candidate,
                alignment: alignmentFor(candidate.persona, subject),
            }));

        const specialists = active.filter(
            ({ persona }) => persona.kind === "genre" || persona.kind === "technical"
        );
        const scored = active
            .filter(({ persona }) => persona.kind === "mood" || persona.kind === "complexity")
            .sort((a, b) => b.alignment - a.alignment || a.order - b.order);
        const general = active.filter(({ persona }) => persona.kind === "general");

        return [...specialists, ...scored, ...general].map(({ persona }) => persona);
    }

    select(subject: PersonaSubject): PersonaInsight[] {
        const context = buildTemplateContext(subject);
        return this.rank(subject)
            .slice(0, this.maxInsights)
            .map((persona) => ({
                personaId: persona.id,
                personaName: persona.name,
                narrative: renderTemplate(persona.template, context),
                tags: [...persona.tags],
            }));
    }
}
