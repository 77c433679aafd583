/**
 * Plex Client
 *
 * Catalog operations used around placeholders: locating items by their
 * external (TMDB/TVDB) ids, renaming titles and triggering partial scans.
 *
 * @module server/integrations/plex/client
 */

import { z } from 'zod';
import logger from '../../utils/logger';
import { parseResponse } from '../arrCommon';
import type { ServiceInstance, TestResult } from '../types';
import { PlexAdapter } from './adapter';

/** Plex library item types */
const TYPE_MOVIE = 1;
const TYPE_SHOW = 2;

const metadataSchema = z.object({
    ratingKey: z.string(),
    title: z.string().optional().default(''),
    index: z.number().optional(),
    parentIndex: z.number().optional(),
    Guid: z.array(z.object({ id: z.string() })).optional().default([]),
});

const containerSchema = z.object({
    MediaContainer: z.object({
        Metadata: z.array(metadataSchema).optional().default([]),
    }),
});

export type PlexMetadata = z.infer<typeof metadataSchema>;

/** The catalog surface the rest of the server depends on. */
export interface CatalogClient {
    findMovieByTmdbId(sectionId: string, tmdbId: number): Promise<string | null>;
    findEpisode(sectionId: string, tvdbId: number, seasonNumber: number, episodeNumber: number): Promise<string | null>;
    renameTitle(ratingKey: string, title: string): Promise<void>;
    refreshPath(sectionId: string, path?: string): Promise<void>;
}

function hasGuid(item: PlexMetadata, guid: string): boolean {
    return item.Guid.some(entry => entry.id === guid);
}

export class PlexClient implements CatalogClient {
    constructor(
        readonly instance: ServiceInstance,
        private readonly adapter: PlexAdapter = new PlexAdapter()
    ) { }

    testConnection(): Promise<TestResult> {
        return this.adapter.testConnection(this.instance);
    }

    private async list(path: string, params?: Record<string, unknown>): Promise<PlexMetadata[]> {
        const response = await this.adapter.get(this.instance, path, { params });
        return parseResponse(containerSchema, response.data, this.instance, path).MediaContainer.Metadata;
    }

    /** Rating key of the movie tagged `tmdb://<id>`, or null. */
    async findMovieByTmdbId(sectionId: string, tmdbId: number): Promise<string | null> {
        const items = await this.list(`/library/sections/${sectionId}/all`, { type: TYPE_MOVIE, includeGuids: 1 });
        return items.find(item => hasGuid(item, `tmdb://${tmdbId}`))?.ratingKey ?? null;
    }

    /** Rating key of an episode of the show tagged `tvdb://<id>`, or null. */
    async findEpisode(sectionId: string, tvdbId: number, seasonNumber: number, episodeNumber: number): Promise<string | null> {
        const shows = await this.list(`/library/sections/${sectionId}/all`, { type: TYPE_SHOW, includeGuids: 1 });
        const show = shows.find(item => hasGuid(item, `tvdb://${tvdbId}`));
        if (!show) return null;

        const episodes = await this.list(`/library/metadata/${show.ratingKey}/allLeaves`);
        const episode = episodes.find(item => item.parentIndex === seasonNumber && item.index === episodeNumber);
        return episode?.ratingKey ?? null;
    }

    async renameTitle(ratingKey: string, title: string): Promise<void> {
        await this.adapter.put(this.instance, `/library/metadata/${ratingKey}`, undefined, {
            params: { 'title.value': title, 'title.locked': 1 },
        });
        logger.debug(`[Plex] Title updated: ratingKey=${ratingKey} title="${title}"`);
    }

    /** Scan a section, or just `path` inside it. */
    async refreshPath(sectionId: string, path?: string): Promise<void> {
        await this.adapter.get(this.instance, `/library/sections/${sectionId}/refresh`, {
            params: path ? { path } : undefined,
        });
        logger.debug(`[Plex] Refresh requested: section=${sectionId}${path ? ` path="${path}"` : ''}`);
    }
}
