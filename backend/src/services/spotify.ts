import axios from "axios";
import { z } from "zod";
import type { AlbumSummary, ArtistRef } from "@artistlens/insight-contract";
import type { CatalogConfig } from "../config";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { cancellationError, throwIfAborted } from "../utils/async";
import { AppError, ErrorCode, errorMessage, providerUnavailable } from "../utils/errors";
import {
    normalizeArtist,
    normalizeTrackFeatures,
    type CatalogCallOptions,
    type CatalogClient,
    type TrackFetchResult,
} from "./catalog";
import { getHttpStatus, type RequestExecutor } from "./rateLimiter";

/**
 * Spotify Catalog Client
 *
 * Client-credentials access to the Spotify Web API: artist search, top
 * tracks, audio features and albums. Responses are validated with zod before
 * they reach the analysis pipeline; nothing is cached except the access token.
 */

const API_BASE = "https://api.spotify.com/v1";
const TOKEN_URL = "https://accounts.spotify.com/api/token";
const SEARCH_LIMIT = 5;
const TOP_TRACK_LIMIT = 10;
// Refresh a minute early so a token never expires mid-request
const TOKEN_EXPIRY_MARGIN_MS = 60000;

const imageSchema = z.object({ url: z.string() });

const tokenSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
});

const artistSchema = z.object({
    id: z.string(),
    name: z.string(),
    genres: z.array(z.string()).default([]),
    popularity: z.number().default(0),
    followers: z
        .object({ total: z.number().nullable().optional() })
        .nullable()
        .optional(),
    images: z.array(imageSchema).default([]),
});

const searchSchema = z.object({
    artists: z.object({
        items: z.array(artistSchema.nullable()),
    }),
});

const topTracksSchema = z.object({
    tracks: z.array(
        z.object({
            id: z.string().nullable(),
            name: z.string(),
        })
    ),
});

const audioFeaturesSchema = z.object({
    audio_features: z.array(
        z
            .object({
                id: z.string(),
                energy: z.number(),
                danceability: z.number(),
                valence: z.number(),
                acousticness: z.number(),
                instrumentalness: z.number(),
                tempo: z.number(),
            })
            .nullable()
    ),
});

const albumsSchema = z.object({
    items: z.array(
        z.object({
            id: z.string(),
            name: z.string(),
            release_date: z.string().nullable().optional(),
            total_tracks: z.number(),
            images: z.array(imageSchema).default([]),
        })
    ),
});

type SpotifyArtist = z.infer<typeof artistSchema>;

/** 401/403/404 on track data means the provider will not give it to us. */
const DENIAL_STATUSES = new Set([401, 403, 404]);

export class SpotifyCatalogClient implements CatalogClient {
    private accessToken: string | null = null;
    private tokenExpiry = 0;
    private tokenRefreshPromise: Promise<string> | null = null;
    private readonly log: Logger;

    constructor(
        private readonly config: CatalogConfig,
        private readonly executor: RequestExecutor,
        log: Logger = rootLogger.child("spotify")
    ) {
        this.log = log;
    }

    async fetchArtist(
        name: string,
        options: CatalogCallOptions = {}
    ): Promise<ArtistRef | null> {
        const payload = await this.request(
            "artist search",
            "/search",
            { q: name, type: "artist", limit: SEARCH_LIMIT, market: this.config.market },
            searchSchema,
            options.signal
        );

        const candidates = payload.artists.items.filter(
            (item): item is SpotifyArtist => item !== null
        );
        if (candidates.length === 0) {
            return null;
        }

        const wanted = name.trim().toLowerCase();
        const best =
            candidates.find((candidate) => candidate.name.trim().toLowerCase() === wanted) ??
            candidates[0];

        return normalizeArtist({
            id: best.id,
            name: best.name,
            genres: best.genres,
            popularity: best.popularity,
            followers: best.followers?.total ?? null,
            imageUrl: best.images[0]?.url ?? null,
        });
    }

    async fetchTopTracks(
        artistId: string,
        options: CatalogCallOptions = {}
    ): Promise<TrackFetchResult> {
        const { signal } = options;

        let trackIds: string[];
        try {
            const payload = await this.request(
                "top tracks",
                `/artists/${encodeURIComponent(artistId)}/top-tracks`,
                { market: this.config.market },
                topTracksSchema,
                signal
            );
            trackIds = payload.tracks
                .map((track) => track.id)
                .filter((id): id is string => typeof id === "string" && id.length > 0)
                .slice(0, TOP_TRACK_LIMIT);
        } catch (error) {
            return this.degradeTrackFetch(artistId, "top tracks", error, []);
        }

        if (trackIds.length === 0) {
            return {
                tracks: [],
                requestedTrackIds: [],
                missingTrackIds: [],
                partial: false,
                reason: null,
            };
        }

        try {
            const payload = await this.request(
                "audio features",
                "/audio-features",
                { ids: trackIds.join(",") },
                audioFeaturesSchema,
                signal
            );

            const byId = new Map(
                payload.audio_features
                    .filter((row): row is NonNullable<typeof row> => row !== null)
                    .map((row) => [row.id, row])
            );
            const tracks = trackIds.flatMap((id) => {
                const row = byId.get(id);
                return row ? [normalizeTrackFeatures(row)] : [];
            });
            const missingTrackIds = trackIds.filter((id) => !byId.has(id));

            return {
                tracks,
                requestedTrackIds: trackIds,
                missingTrackIds,
                partial: missingTrackIds.length > 0,
                reason:
                    missingTrackIds.length > 0
                        ? `Audio features unavailable for ${missingTrackIds.length} of ${trackIds.length} tracks`
                        : null,
            };
        } catch (error) {
            return this.degradeTrackFetch(artistId, "audio features", error, trackIds);
        }
    }

    async fetchAlbums(
        artistId: string,
        options: CatalogCallOptions = {}
    ): Promise<AlbumSummary[]> {
        try {
            const payload = await this.request(
                "albums",
                `/artists/${encodeURIComponent(artistId)}/albums`,
                { include_groups: "album", limit: 50, market: this.config.market },
                albumsSchema,
                options.signal
            );
            return payload.items
                .filter((album) => album.total_tracks > 0)
                .map((album) => ({
                    id: album.id,
                    name: album.name,
                    releaseDate: album.release_date ?? null,
                    totalTracks: album.total_tracks,
                    imageUrl: album.images[0]?.url ?? null,
                }));
        } catch (error) {
            if (options.signal?.aborted) {
                throw cancellationError(options.signal);
            }
            this.log.warn(`Albums unavailable for ${artistId}: ${errorMessage(error)}`);
            return [];
        }
    }

    async ping(options: CatalogCallOptions = {}): Promise<boolean> {
        try {
            throwIfAborted(options.signal);
            await this.getAccessToken();
            return true;
        } catch (error) {
            this.log.debug(`Catalog ping failed: ${errorMessage(error)}`);
            return false;
        }
    }

    /**
     * Token lookup with a promise singleton so concurrent searches share one
     * refresh. The refresh bypasses the request gate (callers already hold a
     * gate slot) and is not tied to any single caller's signal.
     */
    private async getAccessToken(): Promise<string> {
        if (this.accessToken && Date.now() < this.tokenExpiry - TOKEN_EXPIRY_MARGIN_MS) {
            return this.accessToken;
        }

        if (!this.tokenRefreshPromise) {
            this.tokenRefreshPromise = this.performTokenRefresh().finally(() => {
                this.tokenRefreshPromise = null;
            });
        }
        return this.tokenRefreshPromise;
    }

    private async performTokenRefresh(): Promise<string> {
        const { clientId, clientSecret } = this.config;
        if (!clientId || !clientSecret) {
            throw providerUnavailable("Catalog credentials are not configured");
        }

        // HTTP errors stay unwrapped; the request gate retries 429 and 5xx on them
        const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
        const response = await axios.post(TOKEN_URL, "grant_type=client_credentials", {
            headers: {
                Authorization: `Basic ${basic}`,
                "Content-Type": "application/x-www-form-urlencoded",
            },
            timeout: this.config.timeoutMs,
        });

        const parsed = tokenSchema.safeParse(response.data);
        if (!parsed.success) {
            throw providerUnavailable("Catalog returned an unexpected token response");
        }

        this.accessToken = parsed.data.access_token;
        this.tokenExpiry = Date.now() + parsed.data.expires_in * 1000;
        this.log.debug("Catalog access token refreshed");
        return this.accessToken;
    }

    private invalidateToken(): void {
        this.accessToken = null;
        this.tokenExpiry = 0;
    }

    /**
     * Authorized GET through the rate limiter. A 401 drops the cached token
     * and replays the call once with a fresh one.
     */
    private async request<T>(
        label: string,
        path: string,
        params: Record<string, string | number>,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        signal?: AbortSignal
    ): Promise<T> {
        throwIfAborted(signal);

        const get = async (token: string): Promise<unknown> => {
            const response = await axios.get(`${API_BASE}${path}`, {
                headers: { Authorization: `Bearer ${token}` },
                params,
                timeout: this.config.timeoutMs,
                signal,
            });
            return response.data;
        };

        let data: unknown;
        try {
            data = await this.executor.execute(
                async () => {
                    const token = await this.getAccessToken();
                    try {
                        return await get(token);
                    } catch (error) {
                        if (getHttpStatus(error) !== 401) {
                            throw error;
                        }
                        this.log.debug(`${label}: token rejected, refreshing`);
                        this.invalidateToken();
                        return get(await this.getAccessToken());
                    }
                },
                { signal, label }
            );
        } catch (error) {
            throw this.toProviderError(label, error, signal);
        }

        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            this.log.warn(`${label}: unexpected response shape`, {
                issues: parsed.error.issues.length,
            });
            throw providerUnavailable(`Catalog returned an unexpected ${label} response`);
        }
        return parsed.data;
    }

    /**
     * Once the artist is known, a failed track or feature call leaves the
     * analysis with partial data instead of failing it. Cancellation still
     * propagates.
     */
    private degradeTrackFetch(
        artistId: string,
        label: string,
        error: unknown,
        trackIds: string[]
    ): TrackFetchResult {
        if (!(error instanceof AppError) || error.code !== ErrorCode.PROVIDER_UNAVAILABLE) {
            throw error;
        }
        const status = error.details?.status;
        const reason =
            typeof status === "number" && DENIAL_STATUSES.has(status)
                ? `Catalog denied access to ${label} (HTTP ${status})`
                : error.message;
        this.log.warn(`${label} unavailable for ${artistId}: ${reason}`);
        return {
            tracks: [],
            requestedTrackIds: trackIds,
            missingTrackIds: trackIds,
            partial: true,
            reason,
        };
    }

    private toProviderError(
        label: string,
        error: unknown,
        signal?: AbortSignal
    ): AppError {
        if (error instanceof AppError) {
            return error;
        }
        if (signal?.aborted) {
            return cancellationError(signal);
        }
        const status = getHttpStatus(error);
        return providerUnavailable(
            status === 401 || status === 403
                ? `Catalog authorization failed during ${label}`
                : `Catalog ${label} failed: ${errorMessage(error)}`,
            { status, operation: label }
        );
    }
}
