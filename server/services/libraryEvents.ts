/**
 * Library Events
 *
 * Reacts to Radarr/Sonarr library webhooks: creates placeholders for new
 * items, recreates them when real files are deleted, and cleans them up
 * on import, either through the monitoring core (tracked units) or
 * directly (untracked ones).
 *
 * @module server/services/libraryEvents
 */

import path from 'path';
import logger from '../utils/logger';
import type { CatalogClient } from '../integrations/plex/client';
import type { SonarrClient } from '../integrations/sonarr/client';
import type { MonitoringEngine } from './monitoring';
import type { QualityRouter } from './monitoring/qualityRouter';
import { identityKey } from './monitoring/types';
import type { EpisodeIdentity, MediaKind, MovieIdentity, QualityTier, UnitSnapshot } from './monitoring/types';
import type { PlaceholderManager } from './placeholders';
import type { TitleUpdater } from './titleUpdater';

// ============================================================================
// TYPES
// ============================================================================

export interface MovieLibraryEvent {
    eventType: string;
    movie: {
        id?: number;
        title: string;
        year: number;
        tmdbId: number;
    };
}

export interface LibraryEpisode {
    id?: number;
    seasonNumber: number;
    episodeNumber: number;
    title?: string;
}

export interface SeriesLibraryEvent {
    eventType: string;
    series: {
        id?: number;
        title: string;
        year: number;
        tvdbId: number;
    };
    episodes: LibraryEpisode[];
}

export interface LibraryEventOutcome {
    action: 'created' | 'cleaned' | 'tracked' | 'removed' | 'ignored';
    detail: string;
}

export interface LibraryEventOptions {
    engine: MonitoringEngine;
    router: QualityRouter;
    placeholders: PlaceholderManager;
    catalog: CatalogClient;
    titles: TitleUpdater;
    seriesBackend: (tier: QualityTier) => Pick<SonarrClient, 'getEpisodes'>;
    includeSpecials: boolean;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// SERVICE
// ============================================================================

export class LibraryEventService {
    constructor(private readonly options: LibraryEventOptions) { }

    // ========================================================================
    // MOVIES
    // ========================================================================

    async handleMovieEvent(event: MovieLibraryEvent, tier: QualityTier): Promise<LibraryEventOutcome> {
        const { movie } = event;
        const identity: MovieIdentity = { kind: 'movie', tmdbId: movie.tmdbId };
        const route = this.options.router.route('movie', tier);
        const placeholder = { tmdbId: movie.tmdbId, title: movie.title, year: movie.year };

        switch (event.eventType) {
            case 'download':
            case 'moviefileimported': {
                if (this.options.engine.markAvailable(identity)) {
                    return { action: 'tracked', detail: `${identityKey(identity)} marked available` };
                }
                const removed = await this.options.placeholders.deleteMovie(route.libraryFolder, movie.tmdbId);
                await this.refresh('movie', tier);
                return { action: 'cleaned', detail: `${removed.length} placeholder(s) removed` };
            }

            case 'movieadd':
            case 'movieadded':
            case 'moviefiledelete': {
                const result = await this.options.placeholders.createMovie(route.libraryFolder, placeholder);
                if (!result.created) {
                    return { action: 'ignored', detail: 'placeholder already exists' };
                }
                await this.refresh('movie', tier, path.dirname(result.path));
                this.options.titles.scheduleRequestTag({ identity, displayTitle: movie.title, qualityTier: tier });
                return { action: 'created', detail: result.path };
            }

            case 'moviedelete': {
                this.options.engine.forget(identity);
                const removed = await this.options.placeholders.deleteMovie(route.libraryFolder, movie.tmdbId);
                await this.refresh('movie', tier);
                return { action: 'removed', detail: `${removed.length} placeholder(s) removed` };
            }

            default:
                logger.debug(`[LibraryEvents] Ignored movie event: type=${event.eventType} tmdb=${movie.tmdbId}`);
                return { action: 'ignored', detail: `unhandled event ${event.eventType}` };
        }
    }

    // ========================================================================
    // SERIES
    // ========================================================================

    async handleSeriesEvent(event: SeriesLibraryEvent, tier: QualityTier): Promise<LibraryEventOutcome> {
        const { series } = event;
        const route = this.options.router.route('episode', tier);

        switch (event.eventType) {
            case 'download':
            case 'episodefileimported': {
                let tracked = 0;
                let removed = 0;
                for (const episode of event.episodes) {
                    const identity = this.episodeIdentity(series.tvdbId, episode);
                    if (this.options.engine.markAvailable(identity)) {
                        tracked++;
                        continue;
                    }
                    removed += (await this.options.placeholders.deleteEpisode(
                        route.libraryFolder, series.tvdbId, episode.seasonNumber, episode.episodeNumber
                    )).length;
                }
                if (removed > 0) await this.refresh('episode', tier);
                return tracked > 0 && removed === 0
                    ? { action: 'tracked', detail: `${tracked} episode(s) marked available` }
                    : { action: 'cleaned', detail: `${removed} placeholder(s) removed, ${tracked} tracked` };
            }

            case 'seriesadd':
            case 'episodefiledelete': {
                const episodes = event.eventType === 'seriesadd' && event.episodes.length === 0 && series.id !== undefined
                    ? await this.options.seriesBackend(tier).getEpisodes(series.id)
                    : event.episodes;
                return this.createEpisodePlaceholders(series, episodes, tier);
            }

            case 'seriesdelete': {
                const forgotten = this.options.engine.forgetWhere(unit =>
                    unit.identity.kind === 'episode' && unit.identity.tvdbId === series.tvdbId
                );
                const removed = await this.options.placeholders.deleteSeries(route.libraryFolder, series.tvdbId);
                await this.refresh('episode', tier);
                return { action: 'removed', detail: `${removed.length} placeholder(s) removed, ${forgotten} unit(s) forgotten` };
            }

            default:
                logger.debug(`[LibraryEvents] Ignored series event: type=${event.eventType} tvdb=${series.tvdbId}`);
                return { action: 'ignored', detail: `unhandled event ${event.eventType}` };
        }
    }

    // ========================================================================
    // CLEANUP (called by the monitoring core after the grace delay)
    // ========================================================================

    async cleanupUnit(unit: UnitSnapshot): Promise<void> {
        const route = this.options.router.route(unit.kind, unit.qualityTier);
        const { identity } = unit;
        const removed = identity.kind === 'movie'
            ? await this.options.placeholders.deleteMovie(route.libraryFolder, identity.tmdbId)
            : await this.options.placeholders.deleteEpisode(
                route.libraryFolder, identity.tvdbId, identity.seasonNumber, identity.episodeNumber
            );
        logger.info(`[LibraryEvents] Cleanup done: key=${unit.key} removed=${removed.length}`);
        if (removed.length > 0) await this.refresh(unit.kind, unit.qualityTier);
    }

    // ========================================================================
    // INTERNALS
    // ========================================================================

    private episodeIdentity(tvdbId: number, episode: LibraryEpisode): EpisodeIdentity {
        return { kind: 'episode', tvdbId, seasonNumber: episode.seasonNumber, episodeNumber: episode.episodeNumber };
    }

    private async createEpisodePlaceholders(
        series: SeriesLibraryEvent['series'],
        episodes: LibraryEpisode[],
        tier: QualityTier
    ): Promise<LibraryEventOutcome> {
        const route = this.options.router.route('episode', tier);
        const created: string[] = [];

        for (const episode of episodes) {
            const isSpecial = episode.seasonNumber === 0;
            if (episode.id === undefined || episode.episodeNumber < 1 || (isSpecial && !this.options.includeSpecials)) {
                continue;
            }
            const result = await this.options.placeholders.createEpisode(route.libraryFolder, {
                tvdbId: series.tvdbId,
                seriesTitle: series.title,
                year: series.year,
                seasonNumber: episode.seasonNumber,
                episodeNumber: episode.episodeNumber,
                episodeId: episode.id,
            });
            if (!result.created) continue;

            created.push(result.path);
            this.options.titles.scheduleRequestTag({
                identity: this.episodeIdentity(series.tvdbId, episode),
                displayTitle: episode.title || `Episode ${episode.episodeNumber}`,
                qualityTier: tier,
            });
        }

        if (created.length === 0) {
            return { action: 'ignored', detail: 'no new placeholders' };
        }
        await this.refresh('episode', tier, path.join(route.libraryFolder, this.options.placeholders.seriesFolderName({
            seriesTitle: series.title,
            year: series.year,
            tvdbId: series.tvdbId,
        })));
        return { action: 'created', detail: `${created.length} placeholder(s) created` };
    }

    /** Ask the catalog to rescan. Failures are logged; the files are already in place. */
    private async refresh(kind: MediaKind, tier: QualityTier, folder?: string): Promise<void> {
        const { catalogSectionId } = this.options.router.route(kind, tier);
        try {
            await this.options.catalog.refreshPath(catalogSectionId, folder);
        } catch (error) {
            logger.warn(`[LibraryEvents] Catalog refresh failed: section=${catalogSectionId} error="${describe(error)}"`);
        }
    }
}
