/**
 * Settings
 *
 * Environment-driven configuration, validated once with zod and exposed
 * as a frozen record. loadSettings() is pure so tests can feed it any env
 * map; the server entry point calls it with process.env after dotenv has
 * populated it.
 *
 * @module server/config/settings
 */

import fs from 'fs';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger';
import { normalizeBaseUrl, portOf } from '../utils/urlHelper';
import type { MediaKind } from '../services/monitoring/types';
import type { PlayMode } from '../services/monitoring/lookahead';

// ============================================================================
// TYPES
// ============================================================================

export interface BackendSettings {
    url: string;
    apiKey: string;
    /** Port derived from the URL, used to recognize webhooks from this backend. */
    port: number | null;
}

export interface TierSettings {
    backend: BackendSettings;
    libraryFolder: string;
    catalogSectionId: string;
}

export interface KindSettings {
    standard: TierSettings;
    /** Null unless both the high-quality backend URL and library folder are set. */
    high: TierSettings | null;
}

export type PlaceholderStrategy = 'hardlink' | 'copy';

export type TitleUpdateMode = 'OFF' | 'REQUEST' | 'ALL';

export interface Settings {
    port: number;
    logLevel: LogLevel;
    plex: {
        url: string;
        token: string;
    };
    media: Record<MediaKind, KindSettings>;
    monitor: {
        intervalMs: number;
        maxMonitorMs: number;
        maxAttempts: number;
        cleanupDelayMs: number;
    };
    placeholders: {
        sourceFile: string;
        strategy: PlaceholderStrategy;
    };
    episodes: {
        playMode: PlayMode;
        lookahead: number;
        includeSpecials: boolean;
    };
    titleUpdates: TitleUpdateMode;
}

export class ConfigError extends Error {
    public readonly name = 'ConfigError';

    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    }
}

// ============================================================================
// SCHEMA
// ============================================================================

const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const optional = z.preprocess(blankToUndefined, z.string().trim().optional());

const httpUrl = (name: string) => required(name).url(`${name} must be a URL`)
    .refine(value => /^https?:\/\//i.test(value), `${name} must use http or https`);

const optionalHttpUrl = z.preprocess(
    blankToUndefined,
    z.string().trim().url().refine(value => /^https?:\/\//i.test(value), 'must use http or https').optional()
);

const int = (fallback: number, min: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const flag = z.preprocess(
    value => typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value,
    z.enum(['true', 'false', '1', '0', 'yes', 'no']).default('false').transform(value => ['true', '1', 'yes'].includes(value))
);

const envSchema = z.object({
    PORT: int(8000, 1),
    LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['error', 'warn', 'info', 'verbose', 'debug']).default('info')),

    PLEX_URL: httpUrl('PLEX_URL'),
    PLEX_TOKEN: required('PLEX_TOKEN'),
    PLEX_MOVIE_SECTION_ID: required('PLEX_MOVIE_SECTION_ID'),
    PLEX_TV_SECTION_ID: required('PLEX_TV_SECTION_ID'),
    PLEX_MOVIE_4K_SECTION_ID: optional,
    PLEX_TV_4K_SECTION_ID: optional,

    RADARR_URL: httpUrl('RADARR_URL'),
    RADARR_API_KEY: required('RADARR_API_KEY'),
    SONARR_URL: httpUrl('SONARR_URL'),
    SONARR_API_KEY: required('SONARR_API_KEY'),
    RADARR_4K_URL: optionalHttpUrl,
    RADARR_4K_API_KEY: optional,
    SONARR_4K_URL: optionalHttpUrl,
    SONARR_4K_API_KEY: optional,

    MOVIE_LIBRARY_FOLDER: required('MOVIE_LIBRARY_FOLDER'),
    TV_LIBRARY_FOLDER: required('TV_LIBRARY_FOLDER'),
    MOVIE_LIBRARY_4K_FOLDER: optional,
    TV_LIBRARY_4K_FOLDER: optional,

    CHECK_INTERVAL: int(3, 1),
    MAX_MONITOR_TIME: int(120, 1),
    CHECK_MAX_ATTEMPTS: int(1000, 1),
    AVAILABLE_CLEANUP_DELAY: int(10, 0),

    DUMMY_FILE_PATH: required('DUMMY_FILE_PATH'),
    PLACEHOLDER_STRATEGY: z.preprocess(blankToUndefined, z.enum(['hardlink', 'copy']).default('hardlink')),

    TV_PLAY_MODE: z.preprocess(blankToUndefined, z.enum(['episode', 'season', 'series']).default('episode')),
    EPISODES_LOOKAHEAD: int(3, 0),
    INCLUDE_SPECIALS: flag,
    TITLE_UPDATES: z.preprocess(
        value => typeof value === 'string' ? blankToUndefined(value.toUpperCase()) : value,
        z.enum(['OFF', 'REQUEST', 'ALL']).default('ALL')
    ),
});

type Env = z.infer<typeof envSchema>;

// ============================================================================
// LOADING
// ============================================================================

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

function backend(url: string, apiKey: string): BackendSettings {
    const normalized = normalizeBaseUrl(url);
    return { url: normalized, apiKey, port: portOf(normalized) };
}

function highTier(
    url: string | undefined,
    apiKey: string | undefined,
    folder: string | undefined,
    sectionId: string
): TierSettings | null {
    if (!url || !folder) return null;
    return {
        backend: backend(url, apiKey ?? ''),
        libraryFolder: folder,
        catalogSectionId: sectionId,
    };
}

function toSettings(env: Env): Settings {
    return {
        port: env.PORT,
        logLevel: env.LOG_LEVEL,
        plex: {
            url: normalizeBaseUrl(env.PLEX_URL),
            token: env.PLEX_TOKEN,
        },
        media: {
            movie: {
                standard: {
                    backend: backend(env.RADARR_URL, env.RADARR_API_KEY),
                    libraryFolder: env.MOVIE_LIBRARY_FOLDER,
                    catalogSectionId: env.PLEX_MOVIE_SECTION_ID,
                },
                high: highTier(
                    env.RADARR_4K_URL,
                    env.RADARR_4K_API_KEY,
                    env.MOVIE_LIBRARY_4K_FOLDER,
                    env.PLEX_MOVIE_4K_SECTION_ID ?? env.PLEX_MOVIE_SECTION_ID
                ),
            },
            episode: {
                standard: {
                    backend: backend(env.SONARR_URL, env.SONARR_API_KEY),
                    libraryFolder: env.TV_LIBRARY_FOLDER,
                    catalogSectionId: env.PLEX_TV_SECTION_ID,
                },
                high: highTier(
                    env.SONARR_4K_URL,
                    env.SONARR_4K_API_KEY,
                    env.TV_LIBRARY_4K_FOLDER,
                    env.PLEX_TV_4K_SECTION_ID ?? env.PLEX_TV_SECTION_ID
                ),
            },
        },
        monitor: {
            intervalMs: env.CHECK_INTERVAL * 1000,
            maxMonitorMs: env.MAX_MONITOR_TIME * 1000,
            maxAttempts: env.CHECK_MAX_ATTEMPTS,
            cleanupDelayMs: env.AVAILABLE_CLEANUP_DELAY * 1000,
        },
        placeholders: {
            sourceFile: env.DUMMY_FILE_PATH,
            strategy: env.PLACEHOLDER_STRATEGY,
        },
        episodes: {
            playMode: env.TV_PLAY_MODE,
            lookahead: env.EPISODES_LOOKAHEAD,
            includeSpecials: env.INCLUDE_SPECIALS,
        },
        titleUpdates: env.TITLE_UPDATES,
    };
}

/**
 * Validate an env map and build the settings record.
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return deepFreeze(toSettings(parsed.data));
}

/**
 * Startup check that the placeholder source and every configured library
 * folder exist on disk.
 * @throws ConfigError listing every missing path
 */
export function assertLibraryPaths(settings: Settings): void {
    const paths: Array<[string, string]> = [['DUMMY_FILE_PATH', settings.placeholders.sourceFile]];
    for (const kind of ['movie', 'episode'] as const) {
        const { standard, high } = settings.media[kind];
        paths.push([`${kind} library`, standard.libraryFolder]);
        if (high) paths.push([`${kind} 4K library`, high.libraryFolder]);
    }

    const missing = paths
        .filter(([, target]) => !fs.existsSync(target))
        .map(([label, target]) => `${label}: path does not exist (${target})`);

    if (missing.length > 0) {
        throw new ConfigError(missing);
    }
}
