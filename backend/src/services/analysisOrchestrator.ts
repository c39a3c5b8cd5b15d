import type {
    AlbumSummary,
    AnalysisResult,
    ArtistRef,
    DataQuality,
    HistoryEntry,
} from "@artistlens/insight-contract";
import { logger as rootLogger, withLogTiming, type Logger } from "../utils/logger";
import { linkAbortSignal } from "../utils/async";
import { AppError, ErrorCode, artistNotFound, errorMessage } from "../utils/errors";
import { sanitizeArtistQuery } from "../utils/searchQuery";
import type { CatalogClient, TrackFetchResult } from "./catalog";
import { aggregateFeatures } from "./analysis/featureAggregator";
import { scoreMood } from "./analysis/moodScorer";
import { scoreComplexity } from "./analysis/complexityScorer";
import { buildDiscoveryInsights } from "./analysis/discoveryInsights";
import type { PersonaSelector } from "./analysis/personas/selector";

/**
 * Analysis Orchestrator
 *
 * One search request moves through
 *   Received → Fetching → Aggregating → Scoring → Rendering → Completed
 * Only Fetching can fail (artist missing, provider down or too slow); the
 * later stages are pure. Input that cannot be searched is rejected while
 * still in Received, before anything is fetched.
 *
 * History is not touched here: a completed outcome carries the entry the
 * caller should record.
 */

export type AnalysisStage =
    | "Received"
    | "Fetching"
    | "Aggregating"
    | "Scoring"
    | "Rendering"
    | "Completed"
    | "Failed";

export type AnalysisFailureKind = "InvalidInput" | "NotFound" | "ProviderUnavailable";

export interface AnalysisFailure {
    kind: AnalysisFailureKind;
    message: string;
    code: ErrorCode;
}

export type AnalysisOutcome =
    | { status: "completed"; result: AnalysisResult; historyEntry: HistoryEntry }
    | { status: "failed"; failedAt: "Received" | "Fetching"; error: AnalysisFailure };

export type StageListener = (stage: AnalysisStage, query: string) => void;

export interface AnalysisOrchestratorOptions {
    catalog: CatalogClient;
    selector: PersonaSelector;
    /** Upper bound on the whole fetch phase, retries included. */
    timeoutMs: number;
    logger?: Logger;
    now?: () => Date;
    onStageChange?: StageListener;
}

export interface AnalyzeOptions {
    /** Aborts in-flight catalog calls, e.g. when the client disconnects. */
    signal?: AbortSignal;
}

interface FetchedData {
    artist: ArtistRef;
    tracks: TrackFetchResult;
    albums: AlbumSummary[];
}

type FetchOutcome =
    | { ok: true; data: FetchedData }
    | { ok: false; error: AnalysisFailure };

function toFailure(error: unknown): AnalysisFailure {
    if (error instanceof AppError) {
        if (error.code === ErrorCode.INVALID_INPUT) {
            return { kind: "InvalidInput", message: error.message, code: error.code };
        }
        if (error.code === ErrorCode.ARTIST_NOT_FOUND) {
            return { kind: "NotFound", message: error.message, code: error.code };
        }
        return {
            kind: "ProviderUnavailable",
            message: error.message,
            code: ErrorCode.PROVIDER_UNAVAILABLE,
        };
    }
    return {
        kind: "ProviderUnavailable",
        message: `Music catalog is unavailable: ${errorMessage(error)}`,
        code: ErrorCode.PROVIDER_UNAVAILABLE,
    };
}

function describeDataQuality(tracks: TrackFetchResult): DataQuality {
    return {
        partial: tracks.partial,
        requestedTracks: tracks.requestedTrackIds.length,
        analyzedTracks: tracks.tracks.length,
        missingTrackIds: [...tracks.missingTrackIds],
        reason: tracks.reason,
    };
}

export class AnalysisOrchestrator {
    private readonly catalog: CatalogClient;
    private readonly selector: PersonaSelector;
    private readonly timeoutMs: number;
    private readonly log: Logger;
    private readonly now: () => Date;
    private readonly onStageChange?: StageListener;

    constructor(options: AnalysisOrchestratorOptions) {
        this.catalog = options.catalog;
        this.selector = options.selector;
        this.timeoutMs = options.timeoutMs;
        this.log = options.logger ?? rootLogger.child("orchestrator");
        this.now = options.now ?? (() => new Date());
        this.onStageChange = options.onStageChange;
    }

    async analyze(query: string, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
        this.enter("Received", query);

        let name: string;
        try {
            name = sanitizeArtistQuery(query);
        } catch (error) {
            const failure = toFailure(error);
            this.log.debug(`Rejected query: ${failure.message}`);
            return { status: "failed", failedAt: "Received", error: failure };
        }

        this.enter("Fetching", name);
        const fetched = await this.fetch(name, options.signal);
        if (!fetched.ok) {
            this.enter("Failed", name);
            this.log.info(`Analysis failed for "${name}": ${fetched.error.kind}`, {
                message: fetched.error.message,
            });
            return { status: "failed", failedAt: "Fetching", error: fetched.error };
        }
        const { artist, tracks, albums } = fetched.data;

        this.enter("Aggregating", name);
        const stats = aggregateFeatures(tracks.tracks);

        this.enter("Scoring", name);
        const requested = tracks.requestedTrackIds.length;
        const mood = scoreMood(stats, {
            coverage: requested > 0 ? tracks.tracks.length / requested : 1,
        });
        const complexity = scoreComplexity(stats, artist.genres);

        this.enter("Rendering", name);
        const insights = this.selector.select({ artist, stats, mood, complexity });
        const discovery = buildDiscoveryInsights(artist, stats, albums);

        const analyzedAt = this.now().toISOString();
        const result: AnalysisResult = {
            artist,
            stats,
            mood,
            complexity,
            insights,
            discovery,
            albums,
            dataQuality: describeDataQuality(tracks),
            analyzedAt,
        };

        this.enter("Completed", name);
        if (tracks.partial) {
            this.log.info(`Partial data for ${artist.name}: ${tracks.reason ?? "features missing"}`);
        }

        return {
            status: "completed",
            result,
            historyEntry: { artistId: artist.id, artistName: artist.name, analyzedAt },
        };
    }

    private async fetch(name: string, parent?: AbortSignal): Promise<FetchOutcome> {
        const linked = linkAbortSignal(
            parent,
            this.timeoutMs,
            `Analysis timed out after ${this.timeoutMs}ms`
        );
        const { signal } = linked;

        try {
            return await withLogTiming(
                this.log,
                "catalog fetch",
                async (): Promise<FetchOutcome> => {
                    const artist = await this.catalog.fetchArtist(name, { signal });
                    if (!artist) {
                        return { ok: false, error: toFailure(artistNotFound(name)) };
                    }

                    const [tracks, albums] = await Promise.all([
                        this.catalog.fetchTopTracks(artist.id, { signal }),
                        this.catalog.fetchAlbums(artist.id, { signal }),
                    ]);
                    return { ok: true, data: { artist, tracks, albums } };
                },
                { query: name }
            );
        } catch (error) {
            return { ok: false, error: toFailure(error) };
        } finally {
            linked.dispose();
        }
    }

    private enter(stage: AnalysisStage, query: string): void {
        this.log.debug(`${stage}: ${query}`);
        this.onStageChange?.(stage, query);
    }
}
