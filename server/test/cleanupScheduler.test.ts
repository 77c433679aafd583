/**
 * Tests for CleanupScheduler timers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), verbose: vi.fn() },
}));

import logger from '../utils/logger';
import { CleanupScheduler } from '../services/monitoring/cleanupScheduler';

describe('CleanupScheduler', () => {
    let scheduler: CleanupScheduler;

    beforeEach(() => {
        vi.useFakeTimers();
        scheduler = new CleanupScheduler();
    });

    afterEach(() => {
        scheduler.cancelAll();
        vi.useRealTimers();
    });

    it('should run the action after the delay', async () => {
        const action = vi.fn();
        scheduler.schedule('tmdb:42', 5_000, action);

        await vi.advanceTimersByTimeAsync(4_999);
        expect(action).not.toHaveBeenCalled();
        expect(scheduler.isPending('tmdb:42')).toBe(true);

        await vi.advanceTimersByTimeAsync(1);
        expect(action).toHaveBeenCalledTimes(1);
        expect(scheduler.isPending('tmdb:42')).toBe(false);
    });

    it('should replace an earlier timer for the same key', async () => {
        const first = vi.fn();
        const second = vi.fn();
        scheduler.schedule('tmdb:42', 5_000, first);
        scheduler.schedule('tmdb:42', 8_000, second);

        expect(scheduler.pendingCount).toBe(1);
        await vi.advanceTimersByTimeAsync(8_000);
        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);
    });

    it('should cancel a pending action', async () => {
        const action = vi.fn();
        scheduler.schedule('tmdb:42', 5_000, action);

        expect(scheduler.cancel('tmdb:42')).toBe(true);
        expect(scheduler.cancel('tmdb:42')).toBe(false);
        await vi.advanceTimersByTimeAsync(10_000);
        expect(action).not.toHaveBeenCalled();
    });

    it('should cancel everything at once', async () => {
        const action = vi.fn();
        scheduler.schedule('a', 1_000, action);
        scheduler.schedule('b', 2_000, action);

        scheduler.cancelAll();
        await vi.advanceTimersByTimeAsync(5_000);
        expect(action).not.toHaveBeenCalled();
        expect(scheduler.pendingCount).toBe(0);
    });

    it('should log a failing action instead of throwing', async () => {
        scheduler.schedule('tmdb:42', 1_000, async () => {
            throw new Error('disk full');
        });

        await vi.advanceTimersByTimeAsync(1_000);
        expect(logger.error).toHaveBeenCalledWith('[Cleanup] Action failed: key=tmdb:42 error="disk full"');
    });
});
