/**
 * Episode Lookahead Selector
 *
 * Given a series' known episodes and the episode just played, pick the
 * episodes worth acquiring next. Pure: no I/O, no registry access.
 *
 * @module server/services/monitoring/lookahead
 */

// ============================================================================
// TYPES
// ============================================================================

export interface KnownEpisode {
    seasonNumber: number;
    episodeNumber: number;
    hasFile: boolean;
    /** Backend episode id, carried through untouched. */
    id?: number;
}

export interface EpisodePosition {
    seasonNumber: number;
    episodeNumber: number;
}

export interface LookaheadOptions {
    /** Number of episode slots to cover, counting the played one. */
    count: number;
    includeSpecials: boolean;
}

export interface LookaheadResult<T extends KnownEpisode = KnownEpisode> {
    /** Episodes in the window that have no file, in airing order. */
    episodes: T[];
    /** The window reached the last known episode of the series. */
    reachedSeriesEnd: boolean;
}

export type PlayMode = 'episode' | 'season' | 'series';

// ============================================================================
// HELPERS
// ============================================================================

function compare(a: EpisodePosition, b: EpisodePosition): number {
    return a.seasonNumber - b.seasonNumber || a.episodeNumber - b.episodeNumber;
}

function eligible<T extends KnownEpisode>(episodes: readonly T[], includeSpecials: boolean): T[] {
    return episodes
        .filter(ep => ep.seasonNumber > 0 || (includeSpecials && ep.seasonNumber === 0))
        .slice()
        .sort(compare);
}

/** Highest episode number per season. */
function seasonLengths(episodes: readonly KnownEpisode[]): Map<number, number> {
    const lengths = new Map<number, number>();
    for (const ep of episodes) {
        lengths.set(ep.seasonNumber, Math.max(lengths.get(ep.seasonNumber) ?? 0, ep.episodeNumber));
    }
    return lengths;
}

// ============================================================================
// LOOKAHEAD
// ============================================================================

/**
 * Walk forward from the played episode across `count` slots (the played
 * episode is the first), carrying past a season's last known episode into
 * episode 1 of the next known season. Returns every episode inside the
 * window that still lacks a file.
 *
 * A count of 0 still covers the played episode itself.
 */
export function computeLookahead<T extends KnownEpisode>(
    episodes: readonly T[],
    played: EpisodePosition,
    options: LookaheadOptions
): LookaheadResult<T> {
    const known = eligible(episodes, options.includeSpecials);
    const lengths = seasonLengths(known);
    const seasons = Array.from(lengths.keys()).sort((a, b) => a - b);

    if (known.length === 0 || !lengths.has(played.seasonNumber)) {
        return { episodes: [], reachedSeriesEnd: false };
    }

    const last = known[known.length - 1];
    let end: EpisodePosition = { ...played };
    let remaining = Math.max(1, Math.floor(options.count)) - 1;

    while (remaining > 0) {
        const seasonLength = lengths.get(end.seasonNumber) ?? 0;
        const room = Math.max(0, seasonLength - end.episodeNumber);

        if (remaining <= room) {
            end = { seasonNumber: end.seasonNumber, episodeNumber: end.episodeNumber + remaining };
            break;
        }

        const nextSeason = seasons.find(season => season > end.seasonNumber);
        if (nextSeason === undefined) {
            end = { seasonNumber: end.seasonNumber, episodeNumber: Math.max(seasonLength, end.episodeNumber) };
            break;
        }

        // Consume the rest of this season, then land on the next season's first slot
        remaining -= room + 1;
        end = { seasonNumber: nextSeason, episodeNumber: 1 };
    }

    const inWindow = known.filter(ep => compare(ep, played) >= 0 && compare(ep, end) <= 0);

    return {
        episodes: inWindow.filter(ep => !ep.hasFile),
        reachedSeriesEnd: compare(end, last) >= 0,
    };
}

/**
 * Episode selection for the configured play mode:
 *
 * - `episode`: the lookahead window
 * - `season`: the played season, plus the next one when the played
 *   episode is the last of its season
 * - `series`: every known episode
 */
export function selectEpisodesForMode<T extends KnownEpisode>(
    mode: PlayMode,
    episodes: readonly T[],
    played: EpisodePosition,
    options: LookaheadOptions
): LookaheadResult<T> {
    if (mode === 'episode') {
        return computeLookahead(episodes, played, options);
    }

    const known = eligible(episodes, options.includeSpecials);
    if (known.length === 0) {
        return { episodes: [], reachedSeriesEnd: false };
    }

    if (mode === 'series') {
        return { episodes: known.filter(ep => !ep.hasFile), reachedSeriesEnd: true };
    }

    const lengths = seasonLengths(known);
    const playedSeasonLength = lengths.get(played.seasonNumber);
    if (playedSeasonLength === undefined) {
        return { episodes: [], reachedSeriesEnd: false };
    }

    const included = new Set([played.seasonNumber]);
    if (played.episodeNumber >= playedSeasonLength) {
        const nextSeason = Array.from(lengths.keys()).sort((a, b) => a - b).find(season => season > played.seasonNumber);
        if (nextSeason !== undefined) included.add(nextSeason);
    }

    const lastSeason = known[known.length - 1].seasonNumber;
    return {
        episodes: known.filter(ep => included.has(ep.seasonNumber) && !ep.hasFile),
        reachedSeriesEnd: included.has(lastSeason),
    };
}
