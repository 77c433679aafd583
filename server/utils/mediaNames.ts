/**
 * Media naming helpers
 *
 * Filename sanitizing, status-suffixed catalog titles and extraction of
 * the ids embedded in placeholder paths (`{tmdb-42}`, `{tvdb-81189}`,
 * `s01e08`).
 *
 * @module server/utils/mediaNames
 */

import { REQUEST_TAG, STATUS } from '../services/monitoring/status';

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const STATUS_SUFFIX = new RegExp(
    `\\s+-\\s+(?:${[
        ...Object.values(STATUS).filter(label => label !== STATUS.DOWNLOADING).map(escapeRegExp),
        'Downloading\\s+\\d{1,3}%',
        'Downloading\\.\\.\\.',
        escapeRegExp(REQUEST_TAG),
    ].join('|')})\\s*$`,
    'i'
);

export function sanitizeFilename(name: string): string {
    return name.replace(UNSAFE_FILENAME_CHARS, '').replace(/\s+/g, ' ').trim();
}

/** Remove any trailing ` - <status>` markers, however many were stacked. */
export function stripStatusMarkers(title: string): string {
    let current = title.trim();
    let next = current.replace(STATUS_SUFFIX, '').trim();
    while (next !== current) {
        current = next;
        next = current.replace(STATUS_SUFFIX, '').trim();
    }
    return current;
}

export function titleWithStatus(baseTitle: string, statusText: string): string {
    return `${stripStatusMarkers(baseTitle)} - ${statusText}`;
}

export function padNumber(value: number): string {
    return String(value).padStart(2, '0');
}

// ============================================================================
// PATH IDS
// ============================================================================

function firstMatch(pattern: RegExp, text: string | null | undefined): number | null {
    if (!text) return null;
    const match = pattern.exec(text);
    return match ? parseInt(match[1], 10) : null;
}

export function tmdbIdFromPath(filePath: string | null | undefined): number | null {
    return firstMatch(/\{tmdb-(\d+)\}/i, filePath);
}

export function tvdbIdFromPath(filePath: string | null | undefined): number | null {
    return firstMatch(/\{tvdb-(\d+)\}/i, filePath);
}

/** Season/episode from an `s01e08` code in a filename. */
export function episodeCodeFromPath(filePath: string | null | undefined): { seasonNumber: number; episodeNumber: number } | null {
    if (!filePath) return null;
    const match = /s(\d{1,3})e(\d{1,4})/i.exec(filePath);
    if (!match) return null;
    return { seasonNumber: parseInt(match[1], 10), episodeNumber: parseInt(match[2], 10) };
}
