/**
 * Monitoring Engine
 *
 * Entry point to the monitoring core. Wires the registry, cleanup
 * scheduler and batch poller together and exposes the operations the
 * rest of the server uses: registerUnit, computeLookahead, currentStatus.
 *
 * @module server/services/monitoring
 */

import logger from '../../utils/logger';
import { BatchPoller } from './batchPoller';
import {
    computeLookahead as selectLookahead,
    type EpisodePosition,
    type KnownEpisode,
    type LookaheadResult,
} from './lookahead';
import { type AddResult, MonitoringRegistry } from './registry';
import { formatStatus } from './status';
import type { StatusLabel } from './status';
import type {
    BackendResolver,
    StatusTransition,
    UnitIdentity,
    UnitRegistration,
    UnitSnapshot,
    UnitState,
} from './types';

export interface MonitoringEngineOptions {
    intervalMs: number;
    maxMonitorMs: number;
    maxAttempts: number;
    cleanupDelayMs: number;
    resolveBackend: BackendResolver;
    /** Runs after an Available unit's grace delay, once it has left the registry. */
    onCleanup?: (unit: UnitSnapshot) => void | Promise<void>;
    now?: () => number;
}

export interface CurrentStatus {
    status: StatusLabel;
    progress: number | null;
    /** Display form, e.g. `Downloading 42%`. */
    text: string;
    state: UnitState;
}

export class MonitoringEngine {
    readonly registry: MonitoringRegistry;
    readonly poller: BatchPoller;

    constructor(options: MonitoringEngineOptions) {
        this.registry = new MonitoringRegistry({
            cleanupDelayMs: options.cleanupDelayMs,
            onCleanup: options.onCleanup,
            now: options.now,
        });
        this.poller = new BatchPoller(this.registry, {
            intervalMs: options.intervalMs,
            maxMonitorMs: options.maxMonitorMs,
            maxAttempts: options.maxAttempts,
            resolveBackend: options.resolveBackend,
            now: options.now,
        });
    }

    /** Start tracking a unit. Registering a tracked unit again is a no-op. */
    registerUnit(registration: UnitRegistration): AddResult {
        return this.registry.add(registration);
    }

    computeLookahead<T extends KnownEpisode>(
        episodes: readonly T[],
        played: EpisodePosition,
        count: number,
        includeSpecials = false
    ): LookaheadResult<T> {
        return selectLookahead(episodes, played, { count, includeSpecials });
    }

    /** Null when the unit isn't tracked. */
    currentStatus(identity: UnitIdentity | string): CurrentStatus | null {
        const unit = this.registry.get(identity);
        if (!unit) return null;
        return {
            status: unit.status,
            progress: unit.progress,
            text: formatStatus(unit),
            state: unit.state,
        };
    }

    /** Import signal from outside the poller. False when the unit isn't tracked. */
    markAvailable(identity: UnitIdentity | string): boolean {
        return this.registry.markAvailable(identity);
    }

    /** Stop tracking a unit. Returns the removed unit, if it was tracked. */
    forget(identity: UnitIdentity | string): UnitSnapshot | undefined {
        return this.registry.remove(identity);
    }

    /** Remove every tracked unit matching `predicate`. Returns how many were removed. */
    forgetWhere(predicate: (unit: UnitSnapshot) => boolean): number {
        let removed = 0;
        for (const unit of this.registry.all()) {
            if (predicate(unit) && this.registry.remove(unit.key) !== undefined) removed++;
        }
        return removed;
    }

    onTransition(listener: (transition: StatusTransition) => void): () => void {
        return this.registry.onTransition(listener);
    }

    onAdded(listener: (unit: UnitSnapshot) => void): () => void {
        return this.registry.onAdded(listener);
    }

    onRemoved(listener: (unit: UnitSnapshot) => void): () => void {
        return this.registry.onRemoved(listener);
    }

    shutdown(): void {
        this.poller.dispose();
        this.registry.clear();
        logger.info('[Monitoring] Shut down');
    }
}

export { identityKey } from './types';
export type { UnitIdentity, UnitRegistration, UnitSnapshot, StatusTransition, BackendClient } from './types';
export { STATUS, formatStatus } from './status';
export type { StatusLabel } from './status';
