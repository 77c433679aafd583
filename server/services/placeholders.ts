/**
 * Placeholder Files
 *
 * Creates and removes the stand-in video files that make not-yet-acquired
 * movies and episodes show up in the catalog.
 *
 * Layout (ids embedded so deletion never depends on titles):
 *   <lib>/<Title> (<Year>) {tmdb-<id>}/<Title> (<Year>) (dummy).mp4
 *   <lib>/<Series> (<Year>) {tvdb-<id>}/Season NN/<Series> - sNNeNN (dummy) [ID:<episodeId>].mp4
 *
 * @module server/services/placeholders
 */

import fs from 'fs';
import path from 'path';
import logger from '../utils/logger';
import { padNumber, sanitizeFilename } from '../utils/mediaNames';
import type { PlaceholderStrategy } from '../config/settings';

// ============================================================================
// TYPES
// ============================================================================

export interface MoviePlaceholder {
    tmdbId: number;
    title: string;
    year: number;
}

export interface EpisodePlaceholder {
    tvdbId: number;
    seriesTitle: string;
    year: number;
    seasonNumber: number;
    episodeNumber: number;
    /** Backend episode id, embedded as `[ID:n]`. */
    episodeId: number;
}

export interface PlaceholderResult {
    path: string;
    created: boolean;
}

export interface PlaceholderOptions {
    sourceFile: string;
    strategy: PlaceholderStrategy;
}

const PLACEHOLDER_MARKER = '(dummy)';
const EXTENSION = '.mp4';

function isPlaceholder(fileName: string): boolean {
    return fileName.toLowerCase().includes(PLACEHOLDER_MARKER);
}

function withYear(title: string, year: number): string {
    const clean = sanitizeFilename(title);
    return year > 0 ? `${clean} (${year})` : clean;
}

function errorCode(error: unknown): string | undefined {
    if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

// ============================================================================
// MANAGER
// ============================================================================

export class PlaceholderManager {
    constructor(private readonly options: PlaceholderOptions) { }

    // --- Naming ---

    movieFolderName(movie: MoviePlaceholder): string {
        return `${withYear(movie.title, movie.year)} {tmdb-${movie.tmdbId}}`;
    }

    movieFileName(movie: MoviePlaceholder): string {
        return `${withYear(movie.title, movie.year)} ${PLACEHOLDER_MARKER}${EXTENSION}`;
    }

    seriesFolderName(episode: Pick<EpisodePlaceholder, 'seriesTitle' | 'year' | 'tvdbId'>): string {
        return `${withYear(episode.seriesTitle, episode.year)} {tvdb-${episode.tvdbId}}`;
    }

    seasonFolderName(seasonNumber: number): string {
        return `Season ${padNumber(seasonNumber)}`;
    }

    episodeFileName(episode: EpisodePlaceholder): string {
        const code = `s${padNumber(episode.seasonNumber)}e${padNumber(episode.episodeNumber)}`;
        return `${sanitizeFilename(episode.seriesTitle)} - ${code} ${PLACEHOLDER_MARKER} [ID:${episode.episodeId}]${EXTENSION}`;
    }

    // --- Creation ---

    async createMovie(libraryFolder: string, movie: MoviePlaceholder): Promise<PlaceholderResult> {
        const target = path.join(libraryFolder, this.movieFolderName(movie), this.movieFileName(movie));
        return this.place(target);
    }

    async createEpisode(libraryFolder: string, episode: EpisodePlaceholder): Promise<PlaceholderResult> {
        const target = path.join(
            libraryFolder,
            this.seriesFolderName(episode),
            this.seasonFolderName(episode.seasonNumber),
            this.episodeFileName(episode)
        );
        return this.place(target);
    }

    // --- Deletion ---

    /** Delete the movie's placeholder files. Returns the removed paths. */
    async deleteMovie(libraryFolder: string, tmdbId: number): Promise<string[]> {
        const folder = await this.findTaggedFolder(libraryFolder, `{tmdb-${tmdbId}}`);
        if (!folder) return [];
        const removed = await this.removePlaceholders(folder, () => true);
        await this.removeIfEmpty(folder);
        return removed;
    }

    async deleteEpisode(libraryFolder: string, tvdbId: number, seasonNumber: number, episodeNumber: number): Promise<string[]> {
        const folder = await this.findTaggedFolder(libraryFolder, `{tvdb-${tvdbId}}`);
        if (!folder) return [];

        const seasonFolder = path.join(folder, this.seasonFolderName(seasonNumber));
        // s01e10 must not match s01e100
        const code = new RegExp(`\\bs${padNumber(seasonNumber)}e${padNumber(episodeNumber)}(?!\\d)`, 'i');
        const removed = await this.removePlaceholders(seasonFolder, name => code.test(name));
        await this.removeIfEmpty(seasonFolder);
        await this.removeIfEmpty(folder);
        return removed;
    }

    /** Delete every placeholder of a series and prune the emptied folders. */
    async deleteSeries(libraryFolder: string, tvdbId: number): Promise<string[]> {
        const folder = await this.findTaggedFolder(libraryFolder, `{tvdb-${tvdbId}}`);
        if (!folder) return [];

        const removed: string[] = [];
        for (const entry of await this.readDir(folder)) {
            if (!entry.isDirectory()) continue;
            const seasonFolder = path.join(folder, entry.name);
            removed.push(...await this.removePlaceholders(seasonFolder, () => true));
            await this.removeIfEmpty(seasonFolder);
        }
        await this.removeIfEmpty(folder);
        return removed;
    }

    // ========================================================================
    // INTERNALS
    // ========================================================================

    private async place(target: string): Promise<PlaceholderResult> {
        if (fs.existsSync(target)) {
            logger.debug(`[Placeholders] Exists: path="${target}"`);
            return { path: target, created: false };
        }

        await fs.promises.mkdir(path.dirname(target), { recursive: true });

        if (this.options.strategy === 'hardlink') {
            try {
                await fs.promises.link(this.options.sourceFile, target);
                logger.info(`[Placeholders] Linked: path="${target}"`);
                return { path: target, created: true };
            } catch (error) {
                logger.warn(`[Placeholders] Hardlink failed, copying instead: code=${errorCode(error) ?? 'unknown'} path="${target}"`);
            }
        }

        await fs.promises.copyFile(this.options.sourceFile, target);
        logger.info(`[Placeholders] Copied: path="${target}"`);
        return { path: target, created: true };
    }

    private async readDir(folder: string): Promise<fs.Dirent[]> {
        try {
            return await fs.promises.readdir(folder, { withFileTypes: true });
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return [];
            throw error;
        }
    }

    private async findTaggedFolder(libraryFolder: string, tag: string): Promise<string | null> {
        const needle = tag.toLowerCase();
        const match = (await this.readDir(libraryFolder))
            .find(entry => entry.isDirectory() && entry.name.toLowerCase().includes(needle));
        return match ? path.join(libraryFolder, match.name) : null;
    }

    private async removePlaceholders(folder: string, matches: (fileName: string) => boolean): Promise<string[]> {
        const removed: string[] = [];
        for (const entry of await this.readDir(folder)) {
            if (!entry.isFile() || !isPlaceholder(entry.name) || !matches(entry.name)) continue;
            const filePath = path.join(folder, entry.name);
            await fs.promises.unlink(filePath);
            removed.push(filePath);
            logger.info(`[Placeholders] Deleted: path="${filePath}"`);
        }
        return removed;
    }

    private async removeIfEmpty(folder: string): Promise<void> {
        const entries = await this.readDir(folder);
        if (entries.length > 0 || !fs.existsSync(folder)) return;
        await fs.promises.rmdir(folder);
        logger.debug(`[Placeholders] Removed empty folder: path="${folder}"`);
    }
}
