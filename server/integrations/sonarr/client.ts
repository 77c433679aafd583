/**
 * Sonarr Client
 *
 * Typed operations on one Sonarr instance. Doubles as the monitoring
 * core's BackendClient for episodes.
 *
 * @module server/integrations/sonarr/client
 */

import { z } from 'zod';
import logger from '../../utils/logger';
import type { BackendClient, BackendQueueItem, BackendUnitState } from '../../services/monitoring/types';
import { fetchFailedSince, fetchQueue, parseResponse, sendCommand } from '../arrCommon';
import type { ServiceInstance, TestResult } from '../types';
import { SonarrAdapter } from './adapter';

const seriesSchema = z.object({
    id: z.number(),
    title: z.string(),
    year: z.number().optional().default(0),
    tvdbId: z.number(),
    monitored: z.boolean().optional().default(false),
    path: z.string().optional(),
});

const episodeSchema = z.object({
    id: z.number(),
    seriesId: z.number(),
    seasonNumber: z.number(),
    episodeNumber: z.number(),
    title: z.string().optional().default(''),
    hasFile: z.boolean().optional().default(false),
    monitored: z.boolean().optional().default(false),
});

export type SonarrSeries = z.infer<typeof seriesSchema>;
export type SonarrEpisode = z.infer<typeof episodeSchema>;

export class SonarrClient implements BackendClient {
    constructor(
        readonly instance: ServiceInstance,
        private readonly adapter: SonarrAdapter = new SonarrAdapter()
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
        return fetchQueue(this.adapter, this.instance, 'episodeId');
    }

    async fetchUnit(episodeId: number): Promise<BackendUnitState> {
        const path = `/api/v3/episode/${episodeId}`;
        const response = await this.adapter.get(this.instance, path);
        const episode = parseResponse(episodeSchema, response.data, this.instance, path);
        return { hasFile: episode.hasFile };
    }

    fetchFailedSince(since: Date): Promise<number[]> {
        return fetchFailedSince(this.adapter, this.instance, 'episodeId', since);
    }

    // ========================================================================
    // SERIES + EPISODES
    // ========================================================================

    async findSeriesByTvdbId(tvdbId: number): Promise<SonarrSeries | null> {
        const path = '/api/v3/series';
        const response = await this.adapter.get(this.instance, path, { params: { tvdbId } });
        const series = parseResponse(z.array(seriesSchema), response.data, this.instance, path);
        return series.find(entry => entry.tvdbId === tvdbId) ?? null;
    }

    async getEpisodes(seriesId: number): Promise<SonarrEpisode[]> {
        const path = '/api/v3/episode';
        const response = await this.adapter.get(this.instance, path, { params: { seriesId } });
        return parseResponse(z.array(episodeSchema), response.data, this.instance, path);
    }

    async monitorEpisodes(episodeIds: number[]): Promise<void> {
        if (episodeIds.length === 0) return;
        await this.adapter.put(this.instance, '/api/v3/episode/monitor', { episodeIds, monitored: true });
        logger.debug(`[Sonarr] Monitored: instance=${this.instance.id} episodes=${episodeIds.length}`);
    }

    async setSeriesMonitored(seriesId: number): Promise<void> {
        await this.adapter.put(this.instance, '/api/v3/series/editor', { seriesIds: [seriesId], monitored: true });
        logger.info(`[Sonarr] Series monitored: instance=${this.instance.id} seriesId=${seriesId}`);
    }

    async searchEpisodes(episodeIds: number[]): Promise<number | null> {
        if (episodeIds.length === 0) return null;
        const commandId = await sendCommand(this.adapter, this.instance, { name: 'EpisodeSearch', episodeIds });
        logger.info(`[Sonarr] Search triggered: instance=${this.instance.id} episodes=${episodeIds.join(',')} command=${commandId}`);
        return commandId;
    }
}
