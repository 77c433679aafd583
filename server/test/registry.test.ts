/**
 * Tests for the monitoring registry: idempotent adds, transitions,
 * cleanup scheduling and snapshots.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

// ============================================================================
// Mocks
// ============================================================================

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), verbose: vi.fn() },
}));

import { MonitoringRegistry } from '../services/monitoring/registry';
import { STATUS } from '../services/monitoring/status';
import type { StatusTransition, UnitRegistration, UnitSnapshot } from '../services/monitoring/types';

// ============================================================================
// Test Data
// ============================================================================

const MOVIE: UnitRegistration = {
    identity: { kind: 'movie', tmdbId: 42 },
    backendRef: 7,
    displayTitle: 'Example Movie',
    qualityTier: 'standard',
};

const EPISODE: UnitRegistration = {
    identity: { kind: 'episode', tvdbId: 81189, seasonNumber: 1, episodeNumber: 8 },
    backendRef: 501,
    displayTitle: 'Pilot',
    qualityTier: 'high',
};

let clock = 1_000;
let onCleanup: Mock<(unit: UnitSnapshot) => void>;
let registry: MonitoringRegistry;

beforeEach(() => {
    vi.useFakeTimers();
    clock = 1_000;
    onCleanup = vi.fn<(unit: UnitSnapshot) => void>();
    registry = new MonitoringRegistry({ cleanupDelayMs: 10_000, onCleanup, now: () => clock });
});

afterEach(() => {
    registry.clear();
    vi.useRealTimers();
});

// ============================================================================
// Tests
// ============================================================================

describe('MonitoringRegistry', () => {
    describe('add', () => {
        it('should start a unit in Searching', () => {
            const { added, unit } = registry.add(MOVIE);

            expect(added).toBe(true);
            expect(unit).toMatchObject({
                key: 'tmdb:42',
                kind: 'movie',
                state: 'searching',
                status: STATUS.SEARCHING,
                progress: null,
                retrying: false,
                startedAt: 1_000,
                attemptCount: 0,
            });
        });

        it('should be idempotent on the unit key', () => {
            registry.add(MOVIE);
            registry.updateStatus('tmdb:42', { status: STATUS.QUEUED, progress: null });
            clock = 5_000;

            const again = registry.add({ ...MOVIE, displayTitle: 'Other' });

            expect(again.added).toBe(false);
            expect(again.unit.status).toBe(STATUS.QUEUED);
            expect(again.unit.displayTitle).toBe('Example Movie');
            expect(again.unit.startedAt).toBe(1_000);
            expect(registry.size).toBe(1);
        });

        it('should wake only when the registry goes from empty to non-empty', () => {
            const wake = vi.fn();
            registry.onWake(wake);

            registry.add(MOVIE);
            registry.add(EPISODE);
            expect(wake).toHaveBeenCalledTimes(1);

            registry.remove('tmdb:42');
            registry.remove(EPISODE.identity);
            registry.add(MOVIE);
            expect(wake).toHaveBeenCalledTimes(2);
        });

        it('should announce only newly tracked units', () => {
            const added = vi.fn<(unit: UnitSnapshot) => void>();
            registry.onAdded(added);

            registry.add(MOVIE);
            registry.add(MOVIE);

            expect(added).toHaveBeenCalledTimes(1);
            expect(added.mock.calls[0][0]).toMatchObject({ key: 'tmdb:42', status: STATUS.SEARCHING, progress: null });
        });

        it('should key episodes by series, season and episode', () => {
            const { unit } = registry.add(EPISODE);
            expect(unit.key).toBe('tvdb:81189:S01E08');
            expect(registry.has({ kind: 'episode', tvdbId: 81189, seasonNumber: 1, episodeNumber: 8 })).toBe(true);
        });
    });

    describe('updateStatus', () => {
        it('should emit a transition with previous and next views', () => {
            const transitions: StatusTransition[] = [];
            registry.onTransition(t => transitions.push(t));
            registry.add(MOVIE);
            clock = 2_000;

            expect(registry.updateStatus('tmdb:42', { status: STATUS.DOWNLOADING, progress: 60 })).toBe(true);

            expect(transitions).toHaveLength(1);
            expect(transitions[0]).toMatchObject({
                key: 'tmdb:42',
                previous: { status: STATUS.SEARCHING, progress: null },
                next: { status: STATUS.DOWNLOADING, progress: 60 },
                at: 2_000,
            });
            expect(transitions[0].unit.state).toBe('downloading');
            expect(registry.get('tmdb:42')?.lastTransitionAt).toBe(2_000);
        });

        it('should suppress updates that change nothing', () => {
            const listener = vi.fn();
            registry.onTransition(listener);
            registry.add(MOVIE);

            registry.updateStatus('tmdb:42', { status: STATUS.DOWNLOADING, progress: 60 });
            const repeated = registry.updateStatus('tmdb:42', { status: STATUS.DOWNLOADING, progress: 60 });

            expect(repeated).toBe(false);
            expect(listener).toHaveBeenCalledTimes(1);
        });

        it('should return false for an unknown unit', () => {
            expect(registry.updateStatus('tmdb:999', { status: STATUS.QUEUED, progress: null })).toBe(false);
        });

        it('should keep the retrying flag after leaving Retrying', () => {
            registry.add(MOVIE);
            registry.updateStatus('tmdb:42', { status: STATUS.RETRYING, progress: null });
            registry.updateStatus('tmdb:42', { status: STATUS.DOWNLOADING, progress: 5 });

            const unit = registry.get('tmdb:42');
            expect(unit?.retrying).toBe(true);
            expect(unit?.state).toBe('downloading');
        });

        it('should stop emitting after unsubscribe', () => {
            const listener = vi.fn();
            const unsubscribe = registry.onTransition(listener);
            registry.add(MOVIE);
            unsubscribe();

            registry.updateStatus('tmdb:42', { status: STATUS.QUEUED, progress: null });
            expect(listener).not.toHaveBeenCalled();
        });
    });

    describe('cleanup', () => {
        it('should remove an Available unit after the delay and call onCleanup', async () => {
            registry.add(MOVIE);
            registry.markAvailable('tmdb:42');

            expect(registry.isCleanupPending('tmdb:42')).toBe(true);
            await vi.advanceTimersByTimeAsync(9_999);
            expect(registry.has('tmdb:42')).toBe(true);

            await vi.advanceTimersByTimeAsync(1);
            expect(registry.has('tmdb:42')).toBe(false);
            expect(onCleanup).toHaveBeenCalledTimes(1);
            expect(onCleanup.mock.calls[0][0]).toMatchObject({ key: 'tmdb:42', status: STATUS.AVAILABLE });
        });

        it('should cancel the cleanup when the unit is removed first', async () => {
            registry.add(MOVIE);
            registry.markAvailable('tmdb:42');
            registry.remove('tmdb:42');

            expect(registry.isCleanupPending('tmdb:42')).toBe(false);
            await vi.advanceTimersByTimeAsync(20_000);
            expect(onCleanup).not.toHaveBeenCalled();
        });

        it('should not let a stale cleanup remove a re-added unit', async () => {
            registry.add(MOVIE);
            registry.markAvailable('tmdb:42');
            registry.remove('tmdb:42');
            registry.add(MOVIE);

            await vi.advanceTimersByTimeAsync(20_000);
            expect(registry.get('tmdb:42')?.status).toBe(STATUS.SEARCHING);
            expect(onCleanup).not.toHaveBeenCalled();
        });

        it('should cancel the cleanup when the unit leaves Available', async () => {
            registry.add(MOVIE);
            registry.markAvailable('tmdb:42');
            registry.updateStatus('tmdb:42', { status: STATUS.RETRYING, progress: null });

            expect(registry.isCleanupPending('tmdb:42')).toBe(false);
            await vi.advanceTimersByTimeAsync(20_000);
            expect(registry.has('tmdb:42')).toBe(true);
        });
    });

    describe('remove', () => {
        it('should return the removed unit', () => {
            registry.add(MOVIE);
            registry.updateStatus('tmdb:42', { status: STATUS.DOWNLOADING, progress: 30 });

            const removed = registry.remove('tmdb:42');

            expect(removed).toMatchObject({ key: 'tmdb:42', status: STATUS.DOWNLOADING, progress: 30 });
            expect(registry.has('tmdb:42')).toBe(false);
        });

        it('should return undefined for an untracked unit', () => {
            expect(registry.remove('tmdb:42')).toBeUndefined();
        });

        it('should announce the removed unit once', () => {
            const removed = vi.fn<(unit: UnitSnapshot) => void>();
            registry.onRemoved(removed);
            registry.add(MOVIE);

            registry.remove('tmdb:42');
            registry.remove('tmdb:42');

            expect(removed).toHaveBeenCalledTimes(1);
            expect(removed.mock.calls[0][0]).toMatchObject({ key: 'tmdb:42' });
        });
    });

    describe('snapshots', () => {
        it('should not be affected by later removals', () => {
            registry.add(MOVIE);
            registry.add(EPISODE);

            const snapshot = registry.all();
            registry.remove('tmdb:42');

            expect(Array.from(snapshot, unit => unit.key)).toEqual(['tmdb:42', 'tvdb:81189:S01E08']);
            expect(snapshot.size).toBe(2);
        });

        it('should be iterable more than once', () => {
            registry.add(MOVIE);
            const snapshot = registry.all();

            expect(Array.from(snapshot)).toHaveLength(1);
            expect(Array.from(snapshot)).toHaveLength(1);
        });

        it('should hand out frozen copies', () => {
            registry.add(MOVIE);
            const unit = registry.get('tmdb:42');

            expect(Object.isFrozen(unit)).toBe(true);
            registry.updateStatus('tmdb:42', { status: STATUS.QUEUED, progress: null });
            expect(unit?.status).toBe(STATUS.SEARCHING);
        });
    });

    describe('transaction', () => {
        it('should run sections one at a time in order', async () => {
            const order: string[] = [];
            let release: () => void = () => undefined;
            const gate = new Promise<void>(resolve => { release = resolve; });

            const first = registry.transaction(async () => {
                order.push('first:start');
                await gate;
                order.push('first:end');
            });
            const second = registry.transaction(() => {
                order.push('second');
            });

            for (let i = 0; i < 5; i++) await Promise.resolve();
            expect(order).toEqual(['first:start']);

            release();
            await Promise.all([first, second]);
            expect(order).toEqual(['first:start', 'first:end', 'second']);
        });
    });

    it('should count attempts', () => {
        registry.add(MOVIE);
        expect(registry.recordAttempt('tmdb:42')).toBe(1);
        expect(registry.recordAttempt('tmdb:42')).toBe(2);
        expect(registry.recordAttempt('tmdb:404')).toBe(0);
    });
});
