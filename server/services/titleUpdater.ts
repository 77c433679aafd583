/**
 * Title Updater
 *
 * Mirrors monitoring status into the catalog by renaming placeholder
 * items to `<title> - <status>`. Runs beside the monitoring core and
 * only consumes its events (a unit starting to Search, its transitions,
 * its removal); catalog failures never reach the poller.
 *
 * TITLE_UPDATES=ALL follows every transition, REQUEST only tags freshly
 * created placeholders with `[Request]`, OFF does nothing.
 *
 * @module server/services/titleUpdater
 */

import logger from '../utils/logger';
import { Semaphore } from '../utils/semaphore';
import { stripStatusMarkers, titleWithStatus } from '../utils/mediaNames';
import type { TitleUpdateMode } from '../config/settings';
import type { CatalogClient } from '../integrations/plex/client';
import type { QualityRouter } from './monitoring/qualityRouter';
import { REQUEST_TAG, STATUS, formatStatus } from './monitoring/status';
import { identityKey } from './monitoring/types';
import type { QualityTier, StatusTransition, StatusView, UnitIdentity, UnitSnapshot } from './monitoring/types';

export interface TitleUpdaterOptions {
    mode: TitleUpdateMode;
    catalog: CatalogClient;
    router: QualityRouter;
    /** Concurrent catalog calls (default: 3) */
    concurrency?: number;
    /** Lookups before giving up on a placeholder the catalog hasn't scanned yet */
    requestTagAttempts?: number;
    requestTagDelayMs?: number;
}

export interface RequestTagTarget {
    identity: UnitIdentity;
    displayTitle: string;
    qualityTier: QualityTier;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** The monitoring events the updater follows. */
export interface StatusSource {
    onTransition(listener: (transition: StatusTransition) => void): () => void;
    onAdded(listener: (unit: UnitSnapshot) => void): () => void;
    onRemoved(listener: (unit: UnitSnapshot) => void): () => void;
}

export class TitleUpdater {
    private readonly limit: Semaphore;
    private ratingKeys = new Map<string, string>();
    /** Latest rename number per unit while one is in flight; older queued renames are dropped. */
    private sequence = new Map<string, number>();
    private nextSequence = 1;
    /** Units removed while a rename was still in flight; pruned once it settles. */
    private departed = new Set<string>();
    private pending = new Set<Promise<void>>();

    constructor(private readonly options: TitleUpdaterOptions) {
        this.limit = new Semaphore(options.concurrency ?? 3);
    }

    get mode(): TitleUpdateMode {
        return this.options.mode;
    }

    /**
     * Follow new units, status transitions and removals. Returns the
     * unsubscribe function; a no-op unless the mode is ALL.
     */
    attach(source: StatusSource): () => void {
        if (this.options.mode !== 'ALL') {
            return () => undefined;
        }
        const subscriptions = [
            source.onAdded(unit => {
                this.departed.delete(unit.key);
                this.track(this.applyStatus(unit, { status: unit.status, progress: unit.progress }));
            }),
            source.onTransition(transition => {
                this.track(this.applyTransition(transition));
            }),
            source.onRemoved(unit => this.release(unit.key)),
        ];
        return () => {
            for (const unsubscribe of subscriptions) unsubscribe();
        };
    }

    /** Resolves once every rename started so far has settled. */
    async idle(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all(Array.from(this.pending));
        }
    }

    // ========================================================================
    // TRANSITIONS
    // ========================================================================

    async applyTransition(transition: StatusTransition): Promise<void> {
        return this.applyStatus(transition.unit, transition.next);
    }

    /** Rename the unit's catalog item to show `next`. */
    async applyStatus(unit: UnitSnapshot, next: StatusView): Promise<void> {
        const { key } = unit;
        const sequence = this.nextSequence++;
        this.sequence.set(key, sequence);

        // Available restores the plain title so the imported item isn't left suffixed
        const title = next.status === STATUS.AVAILABLE
            ? stripStatusMarkers(unit.displayTitle)
            : titleWithStatus(unit.displayTitle, formatStatus(next));

        await this.limit.run(async () => {
            if (this.sequence.get(key) !== sequence) {
                logger.debug(`[Titles] Superseded: key=${key} title="${title}"`);
                return;
            }
            try {
                const ratingKey = unit.catalogRef ?? await this.resolveRatingKey(unit.identity, unit.qualityTier, true);
                if (!ratingKey) {
                    logger.verbose(`[Titles] Not in catalog yet: key=${key}`);
                    return;
                }
                await this.options.catalog.renameTitle(ratingKey, title);
                logger.info(`[Titles] Renamed: key=${key} title="${title}"`);
            } catch (error) {
                logger.warn(`[Titles] Rename failed: key=${key} error="${describe(error)}"`);
            }
        });

        if (this.sequence.get(key) === sequence) {
            this.sequence.delete(key);
            if (this.departed.delete(key)) {
                this.ratingKeys.delete(key);
            }
        }
    }

    /** Drop cached state for a unit that left monitoring. */
    private release(key: string): void {
        if (this.sequence.has(key)) {
            // Let the in-flight rename finish with the cached key
            this.departed.add(key);
            return;
        }
        this.ratingKeys.delete(key);
    }

    // ========================================================================
    // REQUEST TAG
    // ========================================================================

    /**
     * Tag a new placeholder `<title> - [Request]`, waiting for the catalog
     * to pick it up. Returns true once renamed.
     */
    async tagRequest(target: RequestTagTarget): Promise<boolean> {
        if (this.options.mode === 'OFF') return false;

        const attempts = this.options.requestTagAttempts ?? 5;
        const delayMs = this.options.requestTagDelayMs ?? 10000;
        const key = identityKey(target.identity);
        const title = titleWithStatus(target.displayTitle, REQUEST_TAG);

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                const ratingKey = await this.resolveRatingKey(target.identity, target.qualityTier, false);
                if (ratingKey) {
                    await this.limit.run(() => this.options.catalog.renameTitle(ratingKey, title));
                    logger.info(`[Titles] Request tag set: key=${key} attempt=${attempt}`);
                    return true;
                }
            } catch (error) {
                logger.warn(`[Titles] Request tag failed: key=${key} attempt=${attempt} error="${describe(error)}"`);
            }
            if (attempt < attempts) await sleep(delayMs);
        }

        logger.warn(`[Titles] Gave up on request tag: key=${key} attempts=${attempts}`);
        return false;
    }

    /** Fire-and-track variant used by webhook handlers. */
    scheduleRequestTag(target: RequestTagTarget): void {
        this.track(this.tagRequest(target).then(() => undefined));
    }

    // ========================================================================
    // INTERNALS
    // ========================================================================

    /** `remember` caches the key for later renames; only monitored units are cached. */
    private async resolveRatingKey(identity: UnitIdentity, tier: QualityTier, remember: boolean): Promise<string | null> {
        const key = identityKey(identity);
        const cached = this.ratingKeys.get(key);
        if (cached) return cached;

        const sectionId = this.options.router.route(identity.kind, tier).catalogSectionId;
        const ratingKey = identity.kind === 'movie'
            ? await this.options.catalog.findMovieByTmdbId(sectionId, identity.tmdbId)
            : await this.options.catalog.findEpisode(sectionId, identity.tvdbId, identity.seasonNumber, identity.episodeNumber);

        if (ratingKey && remember) this.ratingKeys.set(key, ratingKey);
        return ratingKey;
    }

    private track(task: Promise<void>): void {
        const tracked = task
            .catch((error: unknown) => {
                logger.error(`[Titles] Unexpected failure: error="${describe(error)}"`);
            })
            .finally(() => {
                this.pending.delete(tracked);
            });
        this.pending.add(tracked);
    }
}
