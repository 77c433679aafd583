/**
 * Cleanup Scheduler
 *
 * Cancellable one-shot timers keyed by unit key. Scheduling an already
 * scheduled key replaces the earlier timer, so at most one action per key
 * is ever pending.
 *
 * @module server/services/monitoring/cleanupScheduler
 */

import logger from '../../utils/logger';

export type CleanupAction = () => void | Promise<void>;

export class CleanupScheduler {
    private timers = new Map<string, NodeJS.Timeout>();

    schedule(key: string, delayMs: number, action: CleanupAction): void {
        this.cancel(key);

        const timer = setTimeout(() => {
            this.timers.delete(key);
            Promise.resolve()
                .then(action)
                .catch((error: unknown) => {
                    logger.error(`[Cleanup] Action failed: key=${key} error="${error instanceof Error ? error.message : String(error)}"`);
                });
        }, Math.max(0, delayMs));

        this.timers.set(key, timer);
        logger.debug(`[Cleanup] Scheduled: key=${key} delayMs=${delayMs}`);
    }

    /** Returns true when a pending action was cancelled. */
    cancel(key: string): boolean {
        const timer = this.timers.get(key);
        if (!timer) return false;
        clearTimeout(timer);
        this.timers.delete(key);
        logger.debug(`[Cleanup] Cancelled: key=${key}`);
        return true;
    }

    cancelAll(): void {
        for (const timer of this.timers.values()) {
            clearTimeout(timer);
        }
        this.timers.clear();
    }

    isPending(key: string): boolean {
        return this.timers.has(key);
    }

    get pendingCount(): number {
        return this.timers.size;
    }
}
