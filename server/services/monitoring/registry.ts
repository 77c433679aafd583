/**
 * Monitoring Registry
 *
 * The single authority over which units are being tracked and what their
 * current status is. Every read and write goes through this object:
 *
 * - add() is idempotent on the unit key, announces the new Searching unit
 *   and wakes the poller when the registry goes from empty to non-empty
 * - updateStatus() emits a transition only when the visible status changes
 * - entering Available schedules a cancellable cleanup; remove() cancels it
 *   and announces the departed unit
 * - all() hands out a point-in-time snapshot that later removals don't affect
 *
 * Individual methods are synchronous and therefore atomic on the event
 * loop. Multi-step sections that await in between take the registry lock
 * through transaction().
 *
 * @module server/services/monitoring/registry
 */

import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { Mutex } from '../../utils/semaphore';
import { CleanupScheduler } from './cleanupScheduler';
import { STATUS, sameStatus, stateForStatus, formatStatus } from './status';
import {
    identityKey,
    type MonitoredUnit,
    type StatusTransition,
    type StatusView,
    type UnitIdentity,
    type UnitRegistration,
    type UnitSnapshot,
} from './types';

// ============================================================================
// TYPES
// ============================================================================

export interface RegistryOptions {
    /** Grace period between Available and removal. */
    cleanupDelayMs: number;
    /** Invoked after an Available unit has been removed by its cleanup timer. */
    onCleanup?: (unit: UnitSnapshot) => void | Promise<void>;
    now?: () => number;
    scheduler?: CleanupScheduler;
}

export interface AddResult {
    added: boolean;
    unit: UnitSnapshot;
}

type UnitRef = UnitIdentity | string;

function toKey(ref: UnitRef): string {
    return typeof ref === 'string' ? ref : identityKey(ref);
}

function snapshotOf(unit: MonitoredUnit): UnitSnapshot {
    return Object.freeze({ ...unit, identity: Object.freeze({ ...unit.identity }) });
}

/**
 * Point-in-time view of the registry. Iterating it is lazy and can be
 * repeated; each pass yields the same units in insertion order.
 */
export class RegistrySnapshot implements Iterable<UnitSnapshot> {
    constructor(private readonly units: readonly MonitoredUnit[]) { }

    *[Symbol.iterator](): Iterator<UnitSnapshot> {
        for (const unit of this.units) {
            yield snapshotOf(unit);
        }
    }

    get size(): number {
        return this.units.length;
    }
}

// ============================================================================
// REGISTRY
// ============================================================================

export class MonitoringRegistry {
    private units = new Map<string, MonitoredUnit>();
    /** Bumped on every insertion so stale cleanup timers can tell they're stale. */
    private generations = new Map<string, number>();
    private nextGeneration = 1;

    private readonly lock = new Mutex();
    private readonly events = new EventEmitter();
    private readonly cleanup: CleanupScheduler;
    private readonly now: () => number;

    constructor(private readonly options: RegistryOptions) {
        this.cleanup = options.scheduler ?? new CleanupScheduler();
        this.now = options.now ?? Date.now;
    }

    // ========================================================================
    // MUTATIONS
    // ========================================================================

    add(registration: UnitRegistration): AddResult {
        const key = identityKey(registration.identity);
        const existing = this.units.get(key);
        if (existing) {
            logger.debug(`[Registry] Already monitored: key=${key} status="${existing.status}"`);
            return { added: false, unit: snapshotOf(existing) };
        }

        const wasEmpty = this.units.size === 0;
        const now = this.now();
        const unit: MonitoredUnit = {
            ...registration,
            identity: { ...registration.identity },
            key,
            kind: registration.identity.kind,
            state: 'searching',
            status: STATUS.SEARCHING,
            progress: null,
            retrying: false,
            startedAt: now,
            lastTransitionAt: now,
            attemptCount: 0,
        };

        this.units.set(key, unit);
        this.generations.set(key, this.nextGeneration++);
        logger.info(`[Registry] Added: key=${key} tier=${unit.qualityTier} ref=${unit.backendRef} title="${unit.displayTitle}"`);

        const snapshot = snapshotOf(unit);
        this.events.emit('added', snapshot);
        if (wasEmpty) {
            this.events.emit('wake');
        }
        return { added: true, unit: snapshot };
    }

    /**
     * Removes a unit and cancels any pending cleanup for it. Returns the
     * removed unit, or undefined when it wasn't tracked.
     */
    remove(ref: UnitRef): UnitSnapshot | undefined {
        const key = toKey(ref);
        this.cleanup.cancel(key);
        this.generations.delete(key);
        const unit = this.units.get(key);
        if (!unit) return undefined;

        this.units.delete(key);
        logger.info(`[Registry] Removed: key=${key} remaining=${this.units.size}`);
        const snapshot = snapshotOf(unit);
        this.events.emit('removed', snapshot);
        return snapshot;
    }

    /**
     * Set a unit's visible status. Returns false, emitting nothing, when the
     * unit is unknown or the status and progress are unchanged.
     */
    updateStatus(ref: UnitRef, next: StatusView): boolean {
        const key = toKey(ref);
        const unit = this.units.get(key);
        if (!unit) return false;

        const previous: StatusView = { status: unit.status, progress: unit.progress };
        if (sameStatus(previous, next)) return false;

        const at = this.now();
        unit.status = next.status;
        unit.progress = next.progress;
        unit.state = stateForStatus(next.status, unit.state);
        unit.lastTransitionAt = at;
        if (next.status === STATUS.RETRYING) {
            unit.retrying = true;
        }

        logger.info(`[Registry] Transition: key=${key} from="${formatStatus(previous)}" to="${formatStatus(next)}"`);

        if (next.status === STATUS.AVAILABLE) {
            this.scheduleCleanup(key);
        } else {
            this.cleanup.cancel(key);
        }

        const transition: StatusTransition = { key, unit: snapshotOf(unit), previous, next, at };
        this.events.emit('transition', transition);
        return true;
    }

    markAvailable(ref: UnitRef): boolean {
        return this.updateStatus(ref, { status: STATUS.AVAILABLE, progress: null });
    }

    /** Count one more poll attempt against the unit. Returns the new count. */
    recordAttempt(ref: UnitRef): number {
        const unit = this.units.get(toKey(ref));
        if (!unit) return 0;
        unit.attemptCount += 1;
        return unit.attemptCount;
    }

    clear(): void {
        this.cleanup.cancelAll();
        this.units.clear();
        this.generations.clear();
    }

    // ========================================================================
    // READS
    // ========================================================================

    get(ref: UnitRef): UnitSnapshot | undefined {
        const unit = this.units.get(toKey(ref));
        return unit ? snapshotOf(unit) : undefined;
    }

    has(ref: UnitRef): boolean {
        return this.units.has(toKey(ref));
    }

    all(): RegistrySnapshot {
        return new RegistrySnapshot(Array.from(this.units.values(), unit => ({ ...unit })));
    }

    get size(): number {
        return this.units.size;
    }

    isCleanupPending(ref: UnitRef): boolean {
        return this.cleanup.isPending(toKey(ref));
    }

    // ========================================================================
    // LOCKING + EVENTS
    // ========================================================================

    /** Run `section` holding the registry lock. Sections queue in FIFO order. */
    transaction<T>(section: () => T | Promise<T>): Promise<T> {
        return this.lock.run(section);
    }

    onTransition(listener: (transition: StatusTransition) => void): () => void {
        this.events.on('transition', listener);
        return () => {
            this.events.off('transition', listener);
        };
    }

    /** Fires for every newly tracked unit, which starts out Searching. */
    onAdded(listener: (unit: UnitSnapshot) => void): () => void {
        this.events.on('added', listener);
        return () => {
            this.events.off('added', listener);
        };
    }

    onRemoved(listener: (unit: UnitSnapshot) => void): () => void {
        this.events.on('removed', listener);
        return () => {
            this.events.off('removed', listener);
        };
    }

    /** Fires when the first unit is added to an empty registry. */
    onWake(listener: () => void): () => void {
        this.events.on('wake', listener);
        return () => {
            this.events.off('wake', listener);
        };
    }

    // ========================================================================
    // CLEANUP
    // ========================================================================

    private scheduleCleanup(key: string): void {
        const generation = this.generations.get(key);

        this.cleanup.schedule(key, this.options.cleanupDelayMs, async () => {
            const unit = this.units.get(key);
            if (!unit || this.generations.get(key) !== generation || unit.status !== STATUS.AVAILABLE) {
                return;
            }
            const snapshot = snapshotOf(unit);
            this.remove(key);
            await this.options.onCleanup?.(snapshot);
        });
    }
}
