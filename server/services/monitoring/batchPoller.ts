/**
 * Batch Poller
 *
 * One self-rescheduling loop that drives every monitored unit. Each cycle:
 *
 * 1. snapshots the registry and groups units by (kind, quality tier)
 * 2. per group, fetches the backend queue once, plus the failure history
 *    and file confirmations it needs, all outside the registry lock
 * 3. takes the registry lock and applies the resulting transitions,
 *    skipping units removed while the I/O was in flight
 *
 * The loop stops itself when the registry drains and is restarted by the
 * registry's wake event on the next add().
 *
 * @module server/services/monitoring/batchPoller
 */

import logger from '../../utils/logger';
import type { MonitoringRegistry } from './registry';
import { STATUS, classifyQueueItem } from './status';
import type {
    BackendClient,
    BackendQueueItem,
    BackendResolver,
    MediaKind,
    QualityTier,
    StatusView,
    UnitSnapshot,
} from './types';

// ============================================================================
// TYPES
// ============================================================================

export interface BatchPollerOptions {
    intervalMs: number;
    /** Wall-clock ceiling measured from a unit's startedAt. */
    maxMonitorMs: number;
    /** Poll attempts allowed per unit before giving up. */
    maxAttempts: number;
    resolveBackend: BackendResolver;
    now?: () => number;
}

export interface CycleReport {
    groups: number;
    queueFetches: number;
    transitions: number;
    expired: number;
    failedGroups: number;
}

/** Everything a cycle learned about one (kind, tier) group. */
interface GroupObservation {
    kind: MediaKind;
    tier: QualityTier;
    units: UnitSnapshot[];
    /** Null when the queue could not be read this cycle. */
    queue: Map<number, BackendQueueItem> | null;
    failed: Set<number>;
    /** File presence for units that dropped out of the queue, by unit key. */
    confirmations: Map<string, boolean>;
}

const EMPTY_REPORT: CycleReport = { groups: 0, queueFetches: 0, transitions: 0, expired: 0, failedGroups: 0 };

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// POLLER
// ============================================================================

export class BatchPoller {
    private timer: NodeJS.Timeout | null = null;
    private active = false;
    private inFlight: Promise<CycleReport> | null = null;
    /** Start time of the last cycle that polled each group, for failure history windows. */
    private lastPolled = new Map<string, number>();
    private readonly now: () => number;
    private readonly unsubscribeWake: () => void;

    constructor(
        private readonly registry: MonitoringRegistry,
        private readonly options: BatchPollerOptions
    ) {
        this.now = options.now ?? Date.now;
        this.unsubscribeWake = registry.onWake(() => this.start());
    }

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    /** Idempotent; the first cycle runs one interval from now. */
    start(): void {
        if (this.active) return;
        this.active = true;
        logger.info(`[Poller] Started: intervalMs=${this.options.intervalMs} units=${this.registry.size}`);
        this.scheduleNext();
    }

    stop(): void {
        if (!this.active) return;
        this.active = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        logger.info('[Poller] Stopped');
    }

    /** Stop and detach from the registry. */
    dispose(): void {
        this.stop();
        this.unsubscribeWake();
    }

    get isRunning(): boolean {
        return this.active;
    }

    private scheduleNext(): void {
        if (!this.active || this.timer) return;

        this.timer = setTimeout(() => {
            this.timer = null;
            this.runCycle()
                .catch((error: unknown) => {
                    logger.error(`[Poller] Cycle failed: error="${describe(error)}"`);
                })
                .finally(() => {
                    if (this.registry.size === 0) {
                        logger.verbose('[Poller] Registry empty, going idle');
                        this.stop();
                    } else {
                        this.scheduleNext();
                    }
                });
        }, this.options.intervalMs);
    }

    // ========================================================================
    // CYCLE
    // ========================================================================

    /** Run one cycle now. A call made while a cycle is in flight joins it. */
    runCycle(): Promise<CycleReport> {
        if (!this.inFlight) {
            this.inFlight = this.cycle().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    private async cycle(): Promise<CycleReport> {
        const cycleStart = this.now();
        const units = Array.from(this.registry.all()).filter(unit => unit.state !== 'available');
        if (units.length === 0) return { ...EMPTY_REPORT };

        const groups = new Map<string, UnitSnapshot[]>();
        for (const unit of units) {
            const groupKey = `${unit.kind}:${unit.qualityTier}`;
            const members = groups.get(groupKey);
            if (members) {
                members.push(unit);
            } else {
                groups.set(groupKey, [unit]);
            }
        }

        const observations = await Promise.all(
            Array.from(groups.entries(), ([groupKey, members]) => this.observe(groupKey, members, cycleStart))
        );

        const report = await this.registry.transaction(() => this.apply(observations));
        report.queueFetches = observations.filter(obs => obs.queue !== null).length;
        report.failedGroups = observations.length - report.queueFetches;

        logger.debug(`[Poller] Cycle done: groups=${report.groups} transitions=${report.transitions} expired=${report.expired} failedGroups=${report.failedGroups}`);
        return report;
    }

    /** Network phase for one group. Never throws; failures leave the queue null. */
    private async observe(groupKey: string, units: UnitSnapshot[], cycleStart: number): Promise<GroupObservation> {
        const { kind, qualityTier: tier } = units[0];
        const observation: GroupObservation = {
            kind,
            tier,
            units,
            queue: null,
            failed: new Set(),
            confirmations: new Map(),
        };

        const client = this.options.resolveBackend(kind, tier);
        if (!client) {
            logger.warn(`[Poller] No backend for group: group=${groupKey} units=${units.length}`);
            return observation;
        }

        let queue: Map<number, BackendQueueItem>;
        try {
            const items = await client.fetchQueue();
            queue = new Map(items.map(item => [item.backendRef, item]));
            observation.queue = queue;
        } catch (error) {
            logger.warn(`[Poller] Queue fetch failed: backend=${client.name} group=${groupKey} error="${describe(error)}"`);
            return observation;
        }

        observation.failed = await this.fetchFailures(client, groupKey, units, cycleStart);
        this.lastPolled.set(groupKey, cycleStart);

        const vanished = units.filter(unit =>
            unit.state === 'downloading' && !queue.has(unit.backendRef) && !observation.failed.has(unit.backendRef)
        );
        await Promise.all(vanished.map(async unit => {
            try {
                const { hasFile } = await client.fetchUnit(unit.backendRef);
                observation.confirmations.set(unit.key, hasFile);
            } catch (error) {
                logger.warn(`[Poller] File check failed: backend=${client.name} key=${unit.key} error="${describe(error)}"`);
            }
        }));

        return observation;
    }

    private async fetchFailures(
        client: BackendClient,
        groupKey: string,
        units: UnitSnapshot[],
        cycleStart: number
    ): Promise<Set<number>> {
        if (!client.fetchFailedSince) return new Set();

        const since = this.lastPolled.get(groupKey) ?? Math.min(...units.map(unit => unit.startedAt));
        try {
            const refs = await client.fetchFailedSince(new Date(Math.min(since, cycleStart)));
            return new Set(refs);
        } catch (error) {
            logger.warn(`[Poller] Failure history fetch failed: backend=${client.name} error="${describe(error)}"`);
            return new Set();
        }
    }

    /** Apply phase. Runs under the registry lock, no I/O. */
    private apply(observations: GroupObservation[]): CycleReport {
        const report: CycleReport = { ...EMPTY_REPORT, groups: observations.length };
        const now = this.now();

        for (const observation of observations) {
            for (const polled of observation.units) {
                const unit = this.registry.get(polled.key);
                if (!unit || unit.state === 'available') continue;

                const attempts = this.registry.recordAttempt(unit.key);
                const next = this.decide(unit, observation);

                if (next?.status === STATUS.AVAILABLE) {
                    if (this.registry.updateStatus(unit.key, next)) report.transitions++;
                    continue;
                }

                const timedOut = now - unit.startedAt > this.options.maxMonitorMs;
                if (timedOut || attempts > this.options.maxAttempts) {
                    this.expire(unit, timedOut ? 'timeout' : 'attempts', attempts);
                    report.expired++;
                    continue;
                }

                if (next && this.registry.updateStatus(unit.key, next)) {
                    report.transitions++;
                }
            }
        }

        return report;
    }

    private decide(unit: UnitSnapshot, observation: GroupObservation): StatusView | null {
        if (observation.queue === null) return null;

        if (observation.failed.has(unit.backendRef)) {
            return { status: STATUS.RETRYING, progress: null };
        }

        const item = observation.queue.get(unit.backendRef);
        if (item) return classifyQueueItem(item);

        if (unit.state === 'downloading') {
            const hasFile = observation.confirmations.get(unit.key);
            if (hasFile === undefined) return null;
            return hasFile
                ? { status: STATUS.AVAILABLE, progress: null }
                : { status: STATUS.RETRYING, progress: null };
        }

        // Still searching, or already retrying: nothing new to report
        return null;
    }

    private expire(unit: UnitSnapshot, reason: 'timeout' | 'attempts', attempts: number): void {
        logger.info(`[Poller] Giving up: key=${unit.key} reason=${reason} attempts=${attempts}`);
        this.registry.updateStatus(unit.key, { status: STATUS.NOT_FOUND, progress: null });
        this.registry.remove(unit.key);
    }
}
