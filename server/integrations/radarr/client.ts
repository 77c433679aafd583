/**
 * Radarr Client
 *
 * Typed operations on one Radarr instance. Doubles as the monitoring
 * core's BackendClient for movies.
 *
 * @module server/integrations/radarr/client
 */

import { z } from 'zod';
import logger from '../../utils/logger';
import type { BackendClient, BackendQueueItem, BackendUnitState } from '../../services/monitoring/types';
import { fetchFailedSince, fetchQueue, parseResponse, sendCommand } from '../arrCommon';
import type { ServiceInstance, TestResult } from '../types';
import { RadarrAdapter } from './adapter';

const movieSchema = z.object({
    id: z.number(),
    title: z.string(),
    year: z.number().optional().default(0),
    tmdbId: z.number(),
    hasFile: z.boolean().optional().default(false),
    monitored: z.boolean().optional().default(false),
    path: z.string().optional(),
});

export type RadarrMovie = z.infer<typeof movieSchema>;

export class RadarrClient implements BackendClient {
    constructor(
        readonly instance: ServiceInstance,
        private readonly adapter: RadarrAdapter = new RadarrAdapter()
    ) { }

    get name(): string {
        return this.instance.name;
    }

    testConnection(): Promise<TestResult> {
        return this.adapter.testConnection(this.instance);
    }

    // ========================================================================
    // BACKEND CLIENT
    // ========================================================================

    fetchQueue(): Promise<BackendQueueItem[]> {
        return fetchQueue(this.adapter, this.instance, 'movieId');
    }

    async fetchUnit(movieId: number): Promise<BackendUnitState> {
        const movie = await this.getMovie(movieId);
        return { hasFile: movie.hasFile };
    }

    fetchFailedSince(since: Date): Promise<number[]> {
        return fetchFailedSince(this.adapter, this.instance, 'movieId', since);
    }

    // ========================================================================
    // MOVIES
    // ========================================================================

    async getMovie(movieId: number): Promise<RadarrMovie> {
        const path = `/api/v3/movie/${movieId}`;
        const response = await this.adapter.get(this.instance, path);
        return parseResponse(movieSchema, response.data, this.instance, path);
    }

    async findMovieByTmdbId(tmdbId: number): Promise<RadarrMovie | null> {
        const path = '/api/v3/movie';
        const response = await this.adapter.get(this.instance, path, { params: { tmdbId } });
        const movies = parseResponse(z.array(movieSchema), response.data, this.instance, path);
        return movies.find(movie => movie.tmdbId === tmdbId) ?? null;
    }

    async setMonitored(movieIds: number[]): Promise<void> {
        if (movieIds.length === 0) return;
        await this.adapter.put(this.instance, '/api/v3/movie/editor', { movieIds, monitored: true });
        logger.debug(`[Radarr] Monitored: instance=${this.instance.id} movieIds=${movieIds.join(',')}`);
    }

    async searchMovies(movieIds: number[]): Promise<number | null> {
        if (movieIds.length === 0) return null;
        const commandId = await sendCommand(this.adapter, this.instance, { name: 'MoviesSearch', movieIds });
        logger.info(`[Radarr] Search triggered: instance=${this.instance.id} movieIds=${movieIds.join(',')} command=${commandId}`);
        return commandId;
    }
}
