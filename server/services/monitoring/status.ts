/**
 * Status Vocabulary
 *
 * The closed set of user-visible status labels, the mapping from raw
 * backend queue entries onto them, and progress computation.
 *
 * @module server/services/monitoring/status
 */

import type { BackendQueueItem, StatusView, UnitState } from './types';

// ============================================================================
// LABELS
// ============================================================================

export const STATUS = {
    SEARCHING: 'Searching...',
    QUEUED: 'Queued',
    DOWNLOADING: 'Downloading',
    PROCESSING: 'Processing...',
    WARNING: 'Warning',
    ERROR: 'Error',
    RETRYING: 'Retrying...',
    AVAILABLE: 'Available',
    NOT_FOUND: 'Not Found',
} as const;

export type StatusLabel = typeof STATUS[keyof typeof STATUS];

/** Title tag for placeholders that have not been requested yet. */
export const REQUEST_TAG = '[Request]';

const QUEUED_STATUSES = new Set(['delay', 'queued', 'paused']);
const FAILED_TRACKED_STATES = new Set(['failedpending', 'failed']);

// ============================================================================
// MAPPING
// ============================================================================

/**
 * Completed fraction of a download as an integer percentage.
 * Returns null when the total size is zero, negative or not a number.
 */
export function computeProgress(sizeTotal: number, sizeRemaining: number): number | null {
    if (!Number.isFinite(sizeTotal) || !Number.isFinite(sizeRemaining) || sizeTotal <= 0) {
        return null;
    }
    const percent = Math.round((100 * (sizeTotal - sizeRemaining)) / sizeTotal);
    return Math.min(100, Math.max(0, percent));
}

/**
 * Map a raw queue entry onto a status label. Unknown statuses are treated
 * as an indeterminate download.
 */
export function classifyQueueItem(item: BackendQueueItem): StatusView {
    const status = item.status.trim().toLowerCase();
    const tracked = item.trackedDownloadState?.trim().toLowerCase();

    if (status === 'failed' || (tracked && FAILED_TRACKED_STATES.has(tracked))) {
        return { status: STATUS.RETRYING, progress: null };
    }
    if (status === 'completed') {
        return { status: STATUS.PROCESSING, progress: null };
    }
    if (QUEUED_STATUSES.has(status)) {
        return { status: STATUS.QUEUED, progress: null };
    }
    if (status === 'warning') {
        return { status: STATUS.WARNING, progress: null };
    }
    if (status === 'error') {
        return { status: STATUS.ERROR, progress: null };
    }
    return {
        status: STATUS.DOWNLOADING,
        progress: computeProgress(item.sizeTotal, item.sizeRemaining),
    };
}

/**
 * Lifecycle phase implied by a label. Labels that don't move the phase
 * (Not Found is terminal and removes the unit) keep the previous one.
 */
export function stateForStatus(status: StatusLabel, previous: UnitState): UnitState {
    switch (status) {
        case STATUS.SEARCHING:
            return 'searching';
        case STATUS.RETRYING:
            return 'retrying';
        case STATUS.AVAILABLE:
            return 'available';
        case STATUS.QUEUED:
        case STATUS.DOWNLOADING:
        case STATUS.PROCESSING:
        case STATUS.WARNING:
        case STATUS.ERROR:
            return 'downloading';
        case STATUS.NOT_FOUND:
            return previous;
    }
}

/** Render a status for display: `Downloading 42%`, `Downloading...`, `Queued`. */
export function formatStatus(view: StatusView): string {
    if (view.status !== STATUS.DOWNLOADING) return view.status;
    return view.progress === null ? 'Downloading...' : `Downloading ${view.progress}%`;
}

export function sameStatus(a: StatusView, b: StatusView): boolean {
    return a.status === b.status && a.progress === b.progress;
}
