/**
 * Tests for episode lookahead selection and play modes.
 */

import { describe, it, expect } from 'vitest';
import { computeLookahead, selectEpisodesForMode, type KnownEpisode } from '../services/monitoring/lookahead';

// ============================================================================
// Test Data
// ============================================================================

/** Season 0 has 2 specials, season 1 has 10 episodes, season 2 has 6. */
function buildSeries(withFiles: (ep: KnownEpisode) => boolean = () => false): KnownEpisode[] {
    const episodes: KnownEpisode[] = [];
    const seasons: Array<[number, number]> = [[0, 2], [1, 10], [2, 6]];
    let id = 100;
    for (const [seasonNumber, count] of seasons) {
        for (let episodeNumber = 1; episodeNumber <= count; episodeNumber++) {
            const ep: KnownEpisode = { seasonNumber, episodeNumber, hasFile: false, id: id++ };
            ep.hasFile = withFiles(ep);
            episodes.push(ep);
        }
    }
    return episodes;
}

function codes(episodes: KnownEpisode[]): string[] {
    return episodes.map(ep => `S${ep.seasonNumber}E${ep.episodeNumber}`);
}

const DEFAULTS = { includeSpecials: false };

// ============================================================================
// Tests
// ============================================================================

describe('computeLookahead', () => {
    it('should roll over into the next season', () => {
        const result = computeLookahead(buildSeries(), { seasonNumber: 1, episodeNumber: 8 }, { ...DEFAULTS, count: 5 });

        expect(codes(result.episodes)).toEqual(['S1E8', 'S1E9', 'S1E10', 'S2E1', 'S2E2']);
        expect(result.reachedSeriesEnd).toBe(false);
    });

    it('should stay inside the season when the window fits', () => {
        const result = computeLookahead(buildSeries(), { seasonNumber: 1, episodeNumber: 2 }, { ...DEFAULTS, count: 3 });

        expect(codes(result.episodes)).toEqual(['S1E2', 'S1E3', 'S1E4']);
    });

    it('should skip episodes that already have a file', () => {
        const series = buildSeries(ep => ep.seasonNumber === 1 && ep.episodeNumber === 9);
        const result = computeLookahead(series, { seasonNumber: 1, episodeNumber: 8 }, { ...DEFAULTS, count: 3 });

        expect(codes(result.episodes)).toEqual(['S1E8', 'S1E10']);
    });

    it('should clamp at the end of the series', () => {
        const result = computeLookahead(buildSeries(), { seasonNumber: 2, episodeNumber: 5 }, { ...DEFAULTS, count: 4 });

        expect(codes(result.episodes)).toEqual(['S2E5', 'S2E6']);
        expect(result.reachedSeriesEnd).toBe(true);
    });

    it('should flag series end when the window lands exactly on the last episode', () => {
        const result = computeLookahead(buildSeries(), { seasonNumber: 2, episodeNumber: 4 }, { ...DEFAULTS, count: 3 });

        expect(codes(result.episodes)).toEqual(['S2E4', 'S2E5', 'S2E6']);
        expect(result.reachedSeriesEnd).toBe(true);
    });

    it('should cover only the played episode for a count of 0 or 1', () => {
        const played = { seasonNumber: 1, episodeNumber: 3 };
        expect(codes(computeLookahead(buildSeries(), played, { ...DEFAULTS, count: 0 }).episodes)).toEqual(['S1E3']);
        expect(codes(computeLookahead(buildSeries(), played, { ...DEFAULTS, count: 1 }).episodes)).toEqual(['S1E3']);
    });

    it('should ignore specials unless included', () => {
        const played = { seasonNumber: 0, episodeNumber: 2 };

        const excluded = computeLookahead(buildSeries(), played, { ...DEFAULTS, count: 3 });
        expect(excluded.episodes).toEqual([]);

        const included = computeLookahead(buildSeries(), played, { includeSpecials: true, count: 3 });
        expect(codes(included.episodes)).toEqual(['S0E2', 'S1E1', 'S1E2']);
    });

    it('should return nothing for an unknown season or empty series', () => {
        expect(computeLookahead(buildSeries(), { seasonNumber: 5, episodeNumber: 1 }, { ...DEFAULTS, count: 3 }))
            .toEqual({ episodes: [], reachedSeriesEnd: false });
        expect(computeLookahead([], { seasonNumber: 1, episodeNumber: 1 }, { ...DEFAULTS, count: 3 }))
            .toEqual({ episodes: [], reachedSeriesEnd: false });
    });

    it('should carry backend ids through', () => {
        const result = computeLookahead(buildSeries(), { seasonNumber: 1, episodeNumber: 1 }, { ...DEFAULTS, count: 1 });

        // ids start at 100 with the two specials first
        expect(result.episodes[0].id).toBe(102);
    });
});

describe('selectEpisodesForMode', () => {
    const played = { seasonNumber: 1, episodeNumber: 4 };

    it('should use the lookahead window in episode mode', () => {
        const result = selectEpisodesForMode('episode', buildSeries(), played, { ...DEFAULTS, count: 2 });

        expect(codes(result.episodes)).toEqual(['S1E4', 'S1E5']);
    });

    it('should take the whole played season in season mode', () => {
        const series = buildSeries(ep => ep.seasonNumber === 1 && ep.episodeNumber <= 3);
        const result = selectEpisodesForMode('season', series, played, { ...DEFAULTS, count: 2 });

        expect(codes(result.episodes)).toEqual(['S1E4', 'S1E5', 'S1E6', 'S1E7', 'S1E8', 'S1E9', 'S1E10']);
        expect(result.reachedSeriesEnd).toBe(false);
    });

    it('should add the next season when the season finale was played', () => {
        const series = buildSeries(ep => ep.seasonNumber === 1);
        const result = selectEpisodesForMode('season', series, { seasonNumber: 1, episodeNumber: 10 }, { ...DEFAULTS, count: 2 });

        expect(codes(result.episodes)).toEqual(['S2E1', 'S2E2', 'S2E3', 'S2E4', 'S2E5', 'S2E6']);
        expect(result.reachedSeriesEnd).toBe(true);
    });

    it('should take every missing episode in series mode', () => {
        const series = buildSeries(ep => ep.seasonNumber === 1);
        const result = selectEpisodesForMode('series', series, played, { ...DEFAULTS, count: 2 });

        expect(result.episodes).toHaveLength(6);
        expect(result.reachedSeriesEnd).toBe(true);
    });
});
