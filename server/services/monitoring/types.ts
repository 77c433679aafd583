/**
 * Monitoring Types
 *
 * Shared shapes for the monitoring core: unit identities, registry
 * records, transitions and the backend contract the poller talks to.
 *
 * @module server/services/monitoring/types
 */

import type { StatusLabel } from './status';

export type MediaKind = 'movie' | 'episode';

export type QualityTier = 'standard' | 'high';

/** Coarse lifecycle phase of a monitored unit. */
export type UnitState = 'searching' | 'downloading' | 'retrying' | 'available';

// ============================================================================
// IDENTITY
// ============================================================================

export interface MovieIdentity {
    kind: 'movie';
    tmdbId: number;
}

export interface EpisodeIdentity {
    kind: 'episode';
    tvdbId: number;
    seasonNumber: number;
    episodeNumber: number;
}

export type UnitIdentity = MovieIdentity | EpisodeIdentity;

/**
 * Stable registry key: `tmdb:42` or `tvdb:81189:S01E08`.
 */
export function identityKey(identity: UnitIdentity): string {
    if (identity.kind === 'movie') {
        return `tmdb:${identity.tmdbId}`;
    }
    const season = String(identity.seasonNumber).padStart(2, '0');
    const episode = String(identity.episodeNumber).padStart(2, '0');
    return `tvdb:${identity.tvdbId}:S${season}E${episode}`;
}

// ============================================================================
// REGISTRY RECORDS
// ============================================================================

/** What a caller hands to registerUnit(). */
export interface UnitRegistration {
    identity: UnitIdentity;
    /** Backend's own id: Radarr movie id or Sonarr episode id. */
    backendRef: number;
    /** Title without status markers, used for catalog renames. */
    displayTitle: string;
    qualityTier: QualityTier;
    /** Catalog rating key when already known. */
    catalogRef?: string;
}

export interface MonitoredUnit extends UnitRegistration {
    key: string;
    kind: MediaKind;
    state: UnitState;
    status: StatusLabel;
    /** Integer 0..100, or null while indeterminate. */
    progress: number | null;
    retrying: boolean;
    startedAt: number;
    lastTransitionAt: number;
    attemptCount: number;
}

export type UnitSnapshot = Readonly<MonitoredUnit>;

export interface StatusView {
    status: StatusLabel;
    progress: number | null;
}

export interface StatusTransition {
    key: string;
    unit: UnitSnapshot;
    previous: StatusView;
    next: StatusView;
    at: number;
}

// ============================================================================
// BACKEND CONTRACT
// ============================================================================

/** Queue entry normalized from a backend's queue listing. */
export interface BackendQueueItem {
    /** Movie id or episode id the download belongs to. */
    backendRef: number;
    status: string;
    trackedDownloadState?: string;
    sizeTotal: number;
    sizeRemaining: number;
}

export interface BackendUnitState {
    hasFile: boolean;
}

/**
 * What the batch poller needs from a download backend. One fetchQueue()
 * and at most one fetchFailedSince() call are made per backend per cycle.
 */
export interface BackendClient {
    readonly name: string;
    fetchQueue(): Promise<BackendQueueItem[]>;
    fetchUnit(backendRef: number): Promise<BackendUnitState>;
    /** Backend refs with a failed download recorded since `since`. */
    fetchFailedSince?(since: Date): Promise<number[]>;
}

export type BackendResolver = (kind: MediaKind, tier: QualityTier) => BackendClient | null;
