/**
 * Tests for library webhook handling: placeholder creation, import
 * cleanup and hand-off to the monitoring core.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

// ============================================================================
// Mocks
// ============================================================================

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), verbose: vi.fn() },
}));

import logger from '../utils/logger';
import { loadSettings } from '../config/settings';
import type { CatalogClient } from '../integrations/plex/client';
import type { SonarrEpisode } from '../integrations/sonarr/client';
import { LibraryEventService, type MovieLibraryEvent, type SeriesLibraryEvent } from '../services/libraryEvents';
import { MonitoringEngine } from '../services/monitoring';
import { QualityRouter } from '../services/monitoring/qualityRouter';
import { STATUS } from '../services/monitoring/status';
import { PlaceholderManager } from '../services/placeholders';
import { TitleUpdater } from '../services/titleUpdater';

interface FakeCatalog extends CatalogClient {
    findMovieByTmdbId: Mock<(sectionId: string, tmdbId: number) => Promise<string | null>>;
    findEpisode: Mock<(sectionId: string, tvdbId: number, season: number, episode: number) => Promise<string | null>>;
    renameTitle: Mock<(ratingKey: string, title: string) => Promise<void>>;
    refreshPath: Mock<(sectionId: string, path?: string) => Promise<void>>;
}

// ============================================================================
// Test Data
// ============================================================================

const MOVIE_EVENT: MovieLibraryEvent = {
    eventType: 'movieadded',
    movie: { id: 7, title: 'Example Movie', year: 2020, tmdbId: 42 },
};

const SERIES_EVENT: SeriesLibraryEvent = {
    eventType: 'seriesadd',
    series: { id: 12, title: 'Example Show', year: 2008, tvdbId: 81189 },
    episodes: [],
};

function backendEpisode(seasonNumber: number, episodeNumber: number): SonarrEpisode {
    return {
        id: seasonNumber * 100 + episodeNumber,
        seriesId: 12,
        seasonNumber,
        episodeNumber,
        title: '',
        hasFile: false,
        monitored: false,
    };
}

let root: string;
let movies: string;
let tv: string;
let catalog: FakeCatalog;
let getEpisodes: Mock<(seriesId: number) => Promise<SonarrEpisode[]>>;
let engine: MonitoringEngine;
let titles: TitleUpdater;
let service: LibraryEventService;

beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'library-events-'));
    movies = path.join(root, 'movies');
    tv = path.join(root, 'tv');
    fs.mkdirSync(movies);
    fs.mkdirSync(tv);
    const source = path.join(root, 'dummy.mp4');
    fs.writeFileSync(source, 'placeholder');

    const router = new QualityRouter(loadSettings({
        PLEX_URL: 'http://plex.local:32400',
        PLEX_TOKEN: 'test-token',
        PLEX_MOVIE_SECTION_ID: '1',
        PLEX_TV_SECTION_ID: '2',
        RADARR_URL: 'http://radarr.local:7878',
        RADARR_API_KEY: 'test-radarr-key',
        SONARR_URL: 'http://sonarr.local:8989',
        SONARR_API_KEY: 'test-sonarr-key',
        MOVIE_LIBRARY_FOLDER: movies,
        TV_LIBRARY_FOLDER: tv,
        DUMMY_FILE_PATH: source,
    }));

    catalog = {
        findMovieByTmdbId: vi.fn<(sectionId: string, tmdbId: number) => Promise<string | null>>().mockResolvedValue('rk-42'),
        findEpisode: vi.fn<(sectionId: string, tvdbId: number, season: number, episode: number) => Promise<string | null>>()
            .mockResolvedValue(null),
        renameTitle: vi.fn<(ratingKey: string, title: string) => Promise<void>>().mockResolvedValue(undefined),
        refreshPath: vi.fn<(sectionId: string, path?: string) => Promise<void>>().mockResolvedValue(undefined),
    };
    getEpisodes = vi.fn<(seriesId: number) => Promise<SonarrEpisode[]>>().mockResolvedValue([
        backendEpisode(0, 1),
        backendEpisode(1, 1),
        backendEpisode(1, 2),
    ]);

    engine = new MonitoringEngine({
        intervalMs: 60_000,
        maxMonitorMs: 120_000,
        maxAttempts: 1_000,
        cleanupDelayMs: 10_000,
        resolveBackend: () => null,
    });
    titles = new TitleUpdater({ mode: 'REQUEST', catalog, router, requestTagAttempts: 1, requestTagDelayMs: 0 });

    service = new LibraryEventService({
        engine,
        router,
        placeholders: new PlaceholderManager({ sourceFile: source, strategy: 'copy' }),
        catalog,
        titles,
        seriesBackend: () => ({ getEpisodes }),
        includeSpecials: false,
    });
});

afterEach(async () => {
    await titles.idle();
    engine.shutdown();
    fs.rmSync(root, { recursive: true, force: true });
});

const movieFolder = () => path.join(movies, 'Example Movie (2020) {tmdb-42}');

// ============================================================================
// Tests
// ============================================================================

describe('LibraryEventService', () => {
    describe('movies', () => {
        it('should create a placeholder, rescan its folder and tag it', async () => {
            const outcome = await service.handleMovieEvent(MOVIE_EVENT, 'standard');
            await titles.idle();

            expect(outcome).toEqual({
                action: 'created',
                detail: path.join(movieFolder(), 'Example Movie (2020) (dummy).mp4'),
            });
            expect(catalog.refreshPath).toHaveBeenCalledWith('1', movieFolder());
            expect(catalog.renameTitle).toHaveBeenCalledWith('rk-42', 'Example Movie - [Request]');
        });

        it('should ignore a placeholder that already exists', async () => {
            await service.handleMovieEvent(MOVIE_EVENT, 'standard');

            const outcome = await service.handleMovieEvent({ ...MOVIE_EVENT, eventType: 'moviefiledelete' }, 'standard');

            expect(outcome).toEqual({ action: 'ignored', detail: 'placeholder already exists' });
        });

        it('should hand a tracked import to the monitoring core', async () => {
            engine.registerUnit({ identity: { kind: 'movie', tmdbId: 42 }, backendRef: 7, displayTitle: 'Example Movie', qualityTier: 'standard' });

            const outcome = await service.handleMovieEvent({ ...MOVIE_EVENT, eventType: 'download' }, 'standard');

            expect(outcome).toEqual({ action: 'tracked', detail: 'tmdb:42 marked available' });
            expect(engine.currentStatus('tmdb:42')?.status).toBe(STATUS.AVAILABLE);
        });

        it('should remove the placeholder for an untracked import', async () => {
            await service.handleMovieEvent(MOVIE_EVENT, 'standard');

            const outcome = await service.handleMovieEvent({ ...MOVIE_EVENT, eventType: 'download' }, 'standard');

            expect(outcome).toEqual({ action: 'cleaned', detail: '1 placeholder(s) removed' });
            expect(fs.existsSync(movieFolder())).toBe(false);
        });

        it('should forget and clean up a deleted movie', async () => {
            await service.handleMovieEvent(MOVIE_EVENT, 'standard');
            engine.registerUnit({ identity: { kind: 'movie', tmdbId: 42 }, backendRef: 7, displayTitle: 'Example Movie', qualityTier: 'standard' });

            const outcome = await service.handleMovieEvent({ ...MOVIE_EVENT, eventType: 'moviedelete' }, 'standard');

            expect(outcome.action).toBe('removed');
            expect(engine.currentStatus('tmdb:42')).toBeNull();
        });

        it('should ignore unrelated events', async () => {
            const outcome = await service.handleMovieEvent({ ...MOVIE_EVENT, eventType: 'grab' }, 'standard');

            expect(outcome).toEqual({ action: 'ignored', detail: 'unhandled event grab' });
        });

        it('should log a failed rescan without failing the event', async () => {
            catalog.refreshPath.mockRejectedValueOnce(new Error('Plex unavailable'));

            const outcome = await service.handleMovieEvent(MOVIE_EVENT, 'standard');

            expect(outcome.action).toBe('created');
            expect(logger.warn).toHaveBeenCalledWith('[LibraryEvents] Catalog refresh failed: section=1 error="Plex unavailable"');
        });
    });

    describe('series', () => {
        it('should fetch episodes for a new series and skip specials', async () => {
            const outcome = await service.handleSeriesEvent(SERIES_EVENT, 'standard');

            expect(getEpisodes).toHaveBeenCalledWith(12);
            expect(outcome).toEqual({ action: 'created', detail: '2 placeholder(s) created' });
            expect(fs.readdirSync(path.join(tv, 'Example Show (2008) {tvdb-81189}'))).toEqual(['Season 01']);
            expect(catalog.refreshPath).toHaveBeenCalledWith('2', path.join(tv, 'Example Show (2008) {tvdb-81189}'));
        });

        it('should mark tracked episodes available and clean the rest', async () => {
            await service.handleSeriesEvent(SERIES_EVENT, 'standard');
            engine.registerUnit({
                identity: { kind: 'episode', tvdbId: 81189, seasonNumber: 1, episodeNumber: 1 },
                backendRef: 101,
                displayTitle: 'Episode 1',
                qualityTier: 'standard',
            });

            const outcome = await service.handleSeriesEvent({
                ...SERIES_EVENT,
                eventType: 'download',
                episodes: [
                    { id: 101, seasonNumber: 1, episodeNumber: 1 },
                    { id: 102, seasonNumber: 1, episodeNumber: 2 },
                ],
            }, 'standard');

            expect(outcome).toEqual({ action: 'cleaned', detail: '1 placeholder(s) removed, 1 tracked' });
            expect(engine.currentStatus('tvdb:81189:S01E01')?.status).toBe(STATUS.AVAILABLE);
        });

        it('should recreate a placeholder when an episode file is deleted', async () => {
            const outcome = await service.handleSeriesEvent({
                ...SERIES_EVENT,
                eventType: 'episodefiledelete',
                episodes: [{ id: 105, seasonNumber: 1, episodeNumber: 5 }],
            }, 'standard');

            expect(getEpisodes).not.toHaveBeenCalled();
            expect(outcome).toEqual({ action: 'created', detail: '1 placeholder(s) created' });
        });

        it('should forget every unit of a deleted series', async () => {
            await service.handleSeriesEvent(SERIES_EVENT, 'standard');
            for (const episodeNumber of [1, 2]) {
                engine.registerUnit({
                    identity: { kind: 'episode', tvdbId: 81189, seasonNumber: 1, episodeNumber },
                    backendRef: 100 + episodeNumber,
                    displayTitle: `Episode ${episodeNumber}`,
                    qualityTier: 'standard',
                });
            }
            engine.registerUnit({ identity: { kind: 'movie', tmdbId: 42 }, backendRef: 7, displayTitle: 'Example Movie', qualityTier: 'standard' });

            const outcome = await service.handleSeriesEvent({ ...SERIES_EVENT, eventType: 'seriesdelete' }, 'standard');

            expect(outcome).toEqual({ action: 'removed', detail: '2 placeholder(s) removed, 2 unit(s) forgotten' });
            expect(engine.registry.size).toBe(1);
            expect(fs.readdirSync(tv)).toEqual([]);
        });
    });

    describe('cleanupUnit', () => {
        it('should delete the placeholder of an available unit', async () => {
            await service.handleMovieEvent(MOVIE_EVENT, 'standard');
            const { unit } = engine.registerUnit({
                identity: { kind: 'movie', tmdbId: 42 },
                backendRef: 7,
                displayTitle: 'Example Movie',
                qualityTier: 'standard',
            });

            await service.cleanupUnit(unit);

            expect(fs.existsSync(movieFolder())).toBe(false);
        });
    });
});
