/**
 * Acquisition Service
 *
 * Turns a playback-start event on a placeholder into backend work: make
 * sure the backend monitors the item, trigger a search, and register the
 * resulting units with the monitoring core.
 *
 * @module server/services/acquisition
 */

import logger from '../utils/logger';
import { episodeCodeFromPath, tmdbIdFromPath, tvdbIdFromPath } from '../utils/mediaNames';
import type { RadarrClient } from '../integrations/radarr/client';
import type { SonarrClient } from '../integrations/sonarr/client';
import type { MonitoringEngine } from './monitoring';
import { selectEpisodesForMode } from './monitoring/lookahead';
import type { PlayMode } from './monitoring/lookahead';
import type { QualityRouter } from './monitoring/qualityRouter';
import { identityKey } from './monitoring/types';
import type { QualityTier } from './monitoring/types';

// ============================================================================
// TYPES
// ============================================================================

export type MovieBackend = Pick<RadarrClient, 'name' | 'findMovieByTmdbId' | 'setMonitored' | 'searchMovies'>;

export type SeriesBackend = Pick<
    SonarrClient,
    'name' | 'findSeriesByTvdbId' | 'getEpisodes' | 'monitorEpisodes' | 'setSeriesMonitored' | 'searchEpisodes'
>;

export interface PlaybackEvent {
    mediaType: 'movie' | 'episode';
    tmdbId?: number | null;
    tvdbId?: number | null;
    seasonNumber?: number | null;
    episodeNumber?: number | null;
    /** Catalog rating key of the item being played. */
    ratingKey?: string | null;
    filePath?: string | null;
    sourcePort?: number | null;
}

export type PlaybackOutcome =
    | { action: 'searching'; tier: QualityTier; registered: string[]; reachedSeriesEnd: boolean }
    | { action: 'skipped'; reason: string };

export interface AcquisitionOptions {
    engine: MonitoringEngine;
    router: QualityRouter;
    movieBackend: (tier: QualityTier) => MovieBackend;
    seriesBackend: (tier: QualityTier) => SeriesBackend;
    episodes: {
        playMode: PlayMode;
        lookahead: number;
        includeSpecials: boolean;
    };
    /** Repeat movie searches within this window are suppressed (default: 30s) */
    searchDebounceMs?: number;
    now?: () => number;
}

/** Playback payload is missing what's needed to identify the item. */
export class PlaybackEventError extends Error {
    public readonly name = 'PlaybackEventError';
}

// ============================================================================
// SERVICE
// ============================================================================

export class AcquisitionService {
    private lastMovieSearch = new Map<string, number>();
    private readonly now: () => number;

    constructor(private readonly options: AcquisitionOptions) {
        this.now = options.now ?? Date.now;
    }

    handlePlayback(event: PlaybackEvent): Promise<PlaybackOutcome> {
        return event.mediaType === 'movie' ? this.handleMovie(event) : this.handleEpisode(event);
    }

    // ========================================================================
    // MOVIES
    // ========================================================================

    private async handleMovie(event: PlaybackEvent): Promise<PlaybackOutcome> {
        const tmdbId = event.tmdbId ?? tmdbIdFromPath(event.filePath);
        if (!tmdbId) {
            throw new PlaybackEventError('Movie playback without a TMDB id');
        }

        const tier = this.options.router.detectTier('movie', { filePath: event.filePath, sourcePort: event.sourcePort });
        const backend = this.options.movieBackend(tier);
        const movie = await backend.findMovieByTmdbId(tmdbId);
        if (!movie) {
            logger.warn(`[Acquisition] Movie not in backend: tmdb=${tmdbId} backend=${backend.name}`);
            return { action: 'skipped', reason: 'movie not found in backend' };
        }
        if (movie.hasFile) {
            return { action: 'skipped', reason: 'movie already has a file' };
        }

        const identity = { kind: 'movie' as const, tmdbId };
        const key = identityKey(identity);
        const lastSearch = this.lastMovieSearch.get(key);
        const debounceMs = this.options.searchDebounceMs ?? 30000;

        if (lastSearch !== undefined && this.now() - lastSearch < debounceMs) {
            logger.debug(`[Acquisition] Search suppressed: key=${key}`);
        } else {
            if (!movie.monitored) await backend.setMonitored([movie.id]);
            await backend.searchMovies([movie.id]);
            this.lastMovieSearch.set(key, this.now());
        }

        this.options.engine.registerUnit({
            identity,
            backendRef: movie.id,
            displayTitle: movie.title,
            qualityTier: tier,
            catalogRef: event.ratingKey ?? undefined,
        });

        return { action: 'searching', tier, registered: [key], reachedSeriesEnd: false };
    }

    // ========================================================================
    // EPISODES
    // ========================================================================

    private async handleEpisode(event: PlaybackEvent): Promise<PlaybackOutcome> {
        const tvdbId = event.tvdbId ?? tvdbIdFromPath(event.filePath);
        const code = episodeCodeFromPath(event.filePath);
        const seasonNumber = event.seasonNumber ?? code?.seasonNumber;
        const episodeNumber = event.episodeNumber ?? code?.episodeNumber;

        if (!tvdbId || seasonNumber == null || episodeNumber == null) {
            throw new PlaybackEventError('Episode playback without TVDB id, season and episode');
        }

        const tier = this.options.router.detectTier('episode', { filePath: event.filePath, sourcePort: event.sourcePort });
        const backend = this.options.seriesBackend(tier);
        const series = await backend.findSeriesByTvdbId(tvdbId);
        if (!series) {
            logger.warn(`[Acquisition] Series not in backend: tvdb=${tvdbId} backend=${backend.name}`);
            return { action: 'skipped', reason: 'series not found in backend' };
        }

        const { playMode, lookahead, includeSpecials } = this.options.episodes;
        const episodes = await backend.getEpisodes(series.id);
        const selection = selectEpisodesForMode(
            playMode,
            episodes,
            { seasonNumber, episodeNumber },
            { count: lookahead, includeSpecials }
        );

        if (selection.reachedSeriesEnd && !series.monitored) {
            await backend.setSeriesMonitored(series.id);
        }
        if (selection.episodes.length === 0) {
            return { action: 'skipped', reason: 'no missing episodes in range' };
        }

        const episodeIds = selection.episodes.map(episode => episode.id);
        await backend.monitorEpisodes(episodeIds);
        await backend.searchEpisodes(episodeIds);

        const registered: string[] = [];
        for (const episode of selection.episodes) {
            const isPlayed = episode.seasonNumber === seasonNumber && episode.episodeNumber === episodeNumber;
            const { unit } = this.options.engine.registerUnit({
                identity: {
                    kind: 'episode',
                    tvdbId,
                    seasonNumber: episode.seasonNumber,
                    episodeNumber: episode.episodeNumber,
                },
                backendRef: episode.id,
                displayTitle: episode.title || `Episode ${episode.episodeNumber}`,
                qualityTier: tier,
                catalogRef: isPlayed ? event.ratingKey ?? undefined : undefined,
            });
            registered.push(unit.key);
        }

        logger.info(`[Acquisition] Episodes requested: tvdb=${tvdbId} mode=${playMode} count=${registered.length} seriesEnd=${selection.reachedSeriesEnd}`);
        return { action: 'searching', tier, registered, reachedSeriesEnd: selection.reachedSeriesEnd };
    }
}
