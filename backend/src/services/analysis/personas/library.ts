import { z } from "zod";
import { MOOD_LABELS } from "@artistlens/insight-contract";
import { AppError, ErrorCategory, ErrorCode } from "../../../utils/errors";
import defaultPersonaData from "../../../data/personas.json";
import { validateTemplate } from "./template";
import {
    COMPARISONS,
    PERSONA_KINDS,
    STAT_FIELDS,
    type PersonaDefinition,
} from "./types";

export const MIN_LIBRARY_SIZE = 40;

const comparisonSchema = z.enum(COMPARISONS);
const numericTrigger = <K extends string>(kind: K) =>
    z.object({ kind: z.literal(kind), op: comparisonSchema, value: z.number() });

const predicateSchema = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("genre"),
        anyOf: z
            .array(z.string().trim().min(1).toLowerCase())
            .min(1),
        noneOf: z.array(z.string().trim().min(1).toLowerCase()).optional(),
    }),
    z.object({
        kind: z.literal("stat"),
        field: z.enum(STAT_FIELDS),
        op: comparisonSchema,
        value: z.number(),
    }),
    z.object({
        kind: z.literal("mood"),
        anyOf: z.array(z.enum(MOOD_LABELS)).min(1),
    }),
    numericTrigger("complexity"),
    numericTrigger("confidence"),
    numericTrigger("popularity"),
    numericTrigger("trackCount"),
    numericTrigger("genreCount"),
]);

const personaSchema = z
    .object({
        id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "id must be kebab-case"),
        name: z.string().trim().min(1),
        kind: z.enum(PERSONA_KINDS),
        tags: z.array(z.string().trim().min(1)).default([]),
        triggers: z.array(predicateSchema).default([]),
        template: z.string().trim().min(1),
    })
    .superRefine((persona, ctx) => {
        if (persona.kind === "general" && persona.triggers.length > 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["triggers"],
                message: "general personas take no triggers",
            });
        }
        if (persona.kind !== "general" && persona.triggers.length === 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["triggers"],
                message: `${persona.kind} personas need at least one trigger`,
            });
        }
        for (const problem of validateTemplate(persona.template)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["template"],
                message: problem,
            });
        }
    });

export interface PersonaLibrary {
    /** Declaration order; the selector breaks ties with it. */
    readonly personas: readonly Readonly<PersonaDefinition>[];
}

export interface PersonaLibraryOptions {
    /** Lower bound on the number of personas; fixture libraries pass 1. */
    minSize?: number;
}

function invalidLibrary(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(
        ErrorCode.INVALID_PERSONA_LIBRARY,
        ErrorCategory.FATAL,
        message,
        details
    );
}

/**
 * Validates persona definitions and freezes them into a library. Built once
 * at startup and handed to the selector; nothing mutates it afterwards.
 */
export function createPersonaLibrary(
    definitions: unknown,
    options: PersonaLibraryOptions = {}
): PersonaLibrary {
    const minSize = options.minSize ?? MIN_LIBRARY_SIZE;
    const parsed = z.array(personaSchema).safeParse(definitions);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw invalidLibrary(`Persona library is invalid: ${issues[0]}`, { issues });
    }

    const personas = parsed.data;
    if (personas.length < minSize) {
        throw invalidLibrary(
            `Persona library needs at least ${minSize} personas, got ${personas.length}`
        );
    }

    const index = new Map<string, Readonly<PersonaDefinition>>();
    for (const persona of personas) {
        if (index.has(persona.id)) {
            throw invalidLibrary(`Duplicate persona id "${persona.id}"`);
        }
        index.set(
            persona.id,
            Object.freeze({
                ...persona,
                tags: Object.freeze([...persona.tags]),
                triggers: Object.freeze(persona.triggers.map((trigger) => Object.freeze(trigger))),
            })
        );
    }

    return Object.freeze({ personas: Object.freeze([...index.values()]) });
}

/** The bundled library from data/personas.json. */
export function loadDefaultPersonaLibrary(): PersonaLibrary {
    return createPersonaLibrary(defaultPersonaData);
}
