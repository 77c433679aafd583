/**
 * Webhook Payloads
 *
 * Validates incoming webhook bodies (Radarr, Sonarr, Tautulli playback)
 * and normalizes them into the events the services consume.
 *
 * @module server/routes/webhooks/payloads
 */

import { z } from 'zod';
import type { PlaybackEvent } from '../../services/acquisition';
import type { MovieLibraryEvent, SeriesLibraryEvent } from '../../services/libraryEvents';

export type ParsedWebhook =
    | { kind: 'test'; eventType: string }
    | { kind: 'playback'; eventType: string; event: PlaybackEvent; filePath: string | null }
    | { kind: 'movie'; eventType: string; event: MovieLibraryEvent; filePath: string | null }
    | { kind: 'series'; eventType: string; event: SeriesLibraryEvent; filePath: string | null }
    | { kind: 'ignored'; eventType: string };

export class WebhookPayloadError extends Error {
    public readonly name = 'WebhookPayloadError';
}

// ============================================================================
// SCHEMAS
// ============================================================================

/**
 * Ids may arrive as numbers, numeric strings, or unsubstituted template
 * text such as `{tmdb_id}`; the latter becomes null.
 */
const looseId = z.union([z.number(), z.string()]).nullish().transform(value => {
    if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) return parseInt(value.trim(), 10);
    return null;
});

const looseString = z.union([z.string(), z.number()]).nullish().transform(value =>
    value === null || value === undefined || value === '' ? null : String(value)
);

const envelopeSchema = z.object({
    event: z.string().optional(),
    eventType: z.string().optional(),
});

const playbackSchema = z.object({
    media: z.object({
        type: z.string(),
        ids: z.object({
            tmdb: looseId,
            tvdb: looseId,
            plex: looseString,
        }).partial().default({}),
        season_num: looseId,
        episode_num: looseId,
        file_info: z.object({ path: z.string().optional() }).optional(),
    }),
});

const movieSchema = z.object({
    movie: z.object({
        id: z.number().optional(),
        title: z.string().default('Unknown Movie'),
        year: z.number().nullish().transform(year => year ?? 0),
        tmdbId: looseId,
        folderPath: z.string().optional(),
    }),
    remoteMovie: z.object({ tmdbId: looseId }).partial().optional(),
    movieFile: z.object({ path: z.string().optional() }).optional(),
});

const seriesSchema = z.object({
    series: z.object({
        id: z.number().optional(),
        title: z.string().default('Unknown Series'),
        year: z.number().nullish().transform(year => year ?? 0),
        tvdbId: looseId,
        path: z.string().optional(),
    }),
    episodes: z.array(z.object({
        id: z.number().optional(),
        seasonNumber: z.number(),
        episodeNumber: z.number(),
        title: z.string().optional(),
    })).default([]),
    episodeFile: z.object({ path: z.string().optional() }).optional(),
});

function firstIssue(error: z.ZodError): string {
    const issue = error.errors[0];
    return issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'invalid payload';
}

// ============================================================================
// PARSER
// ============================================================================

/**
 * @throws WebhookPayloadError when the body is not an object or a
 *         recognized event lacks its required fields
 */
export function parseWebhook(body: unknown): ParsedWebhook {
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success || typeof body !== 'object' || body === null) {
        throw new WebhookPayloadError('Webhook body must be a JSON object');
    }

    const eventType = (envelope.data.event ?? envelope.data.eventType ?? 'unknown').trim().toLowerCase();

    if (eventType === 'test') {
        return { kind: 'test', eventType };
    }

    if (eventType === 'playback.start') {
        const parsed = playbackSchema.safeParse(body);
        if (!parsed.success) throw new WebhookPayloadError(firstIssue(parsed.error));
        const { media } = parsed.data;
        if (media.type !== 'movie' && media.type !== 'episode') {
            return { kind: 'ignored', eventType };
        }
        const filePath = media.file_info?.path ?? null;
        return {
            kind: 'playback',
            eventType,
            filePath,
            event: {
                mediaType: media.type,
                tmdbId: media.ids.tmdb ?? null,
                tvdbId: media.ids.tvdb ?? null,
                ratingKey: media.ids.plex ?? null,
                seasonNumber: media.season_num,
                episodeNumber: media.episode_num,
                filePath,
            },
        };
    }

    if ('movie' in body) {
        const parsed = movieSchema.safeParse(body);
        if (!parsed.success) throw new WebhookPayloadError(firstIssue(parsed.error));
        const { movie, remoteMovie, movieFile } = parsed.data;
        const tmdbId = movie.tmdbId ?? remoteMovie?.tmdbId ?? null;
        if (!tmdbId) throw new WebhookPayloadError('movie.tmdbId: missing TMDB id');
        return {
            kind: 'movie',
            eventType,
            filePath: movieFile?.path ?? movie.folderPath ?? null,
            event: {
                eventType,
                movie: { id: movie.id, title: movie.title, year: movie.year, tmdbId },
            },
        };
    }

    if ('series' in body) {
        const parsed = seriesSchema.safeParse(body);
        if (!parsed.success) throw new WebhookPayloadError(firstIssue(parsed.error));
        const { series, episodes, episodeFile } = parsed.data;
        if (!series.tvdbId) throw new WebhookPayloadError('series.tvdbId: missing TVDB id');
        return {
            kind: 'series',
            eventType,
            filePath: episodeFile?.path ?? series.path ?? null,
            event: {
                eventType,
                series: { id: series.id, title: series.title, year: series.year, tvdbId: series.tvdbId },
                episodes,
            },
        };
    }

    return { kind: 'ignored', eventType };
}
