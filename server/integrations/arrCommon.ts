/**
 * Shared Radarr/Sonarr API plumbing
 *
 * Both backends speak the same v3 queue, history and command dialect;
 * only the field that names the monitored item differs (movieId vs
 * episodeId). Responses are validated with zod before use.
 *
 * @module server/integrations/arrCommon
 */

import { z } from 'zod';
import type { BackendQueueItem } from '../services/monitoring/types';
import type { BaseAdapter } from './BaseAdapter';
import { AdapterError } from './errors';
import type { ServiceInstance } from './types';

/** Queue page size; one request covers any realistic queue. */
export const QUEUE_PAGE_SIZE = 500;

/** Hard stop for pathological queues. */
const MAX_QUEUE_PAGES = 10;

export type ArrRefField = 'movieId' | 'episodeId';

// ============================================================================
// SCHEMAS
// ============================================================================

const queueRecordSchema = z.object({
    id: z.number(),
    movieId: z.number().optional(),
    episodeId: z.number().optional(),
    size: z.number().optional().default(0),
    sizeleft: z.number().optional().default(0),
    status: z.string().optional().default('unknown'),
    trackedDownloadStatus: z.string().optional(),
    trackedDownloadState: z.string().optional(),
});

const queuePageSchema = z.object({
    page: z.number().optional(),
    totalRecords: z.number().optional(),
    records: z.array(queueRecordSchema).default([]),
});

const historyRecordSchema = z.object({
    movieId: z.number().optional(),
    episodeId: z.number().optional(),
    eventType: z.string(),
});

const commandSchema = z.object({
    id: z.number(),
    name: z.string(),
});

export type QueueRecord = z.infer<typeof queueRecordSchema>;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Validate a response body, turning schema mismatches into an
 * AdapterError so callers see one error type.
 */
export function parseResponse<S extends z.ZodTypeAny>(
    schema: S,
    data: unknown,
    instance: ServiceInstance,
    path: string
): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
        const issue = result.error.errors[0];
        throw new AdapterError('REQUEST_ERROR',
            `${instance.name} returned an unexpected response for ${path}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid body'}`,
            { instanceId: instance.id, path }
        );
    }
    return result.data;
}

/** Map a queue record onto the poller's shape. Records without the ref field are dropped. */
export function toBackendQueueItem(record: QueueRecord, refField: ArrRefField): BackendQueueItem | null {
    const backendRef = record[refField];
    if (backendRef === undefined) return null;
    return {
        backendRef,
        status: record.status,
        trackedDownloadState: record.trackedDownloadState,
        sizeTotal: record.size,
        sizeRemaining: record.sizeleft,
    };
}

// ============================================================================
// OPERATIONS
// ============================================================================

export async function fetchQueue(
    adapter: BaseAdapter,
    instance: ServiceInstance,
    refField: ArrRefField
): Promise<BackendQueueItem[]> {
    const path = '/api/v3/queue';
    const items: BackendQueueItem[] = [];

    for (let page = 1; page <= MAX_QUEUE_PAGES; page++) {
        const response = await adapter.get(instance, path, {
            params: { page, pageSize: QUEUE_PAGE_SIZE },
            timeout: 10000,
        });
        const body = parseResponse(queuePageSchema, response.data, instance, path);

        for (const record of body.records) {
            const item = toBackendQueueItem(record, refField);
            if (item) items.push(item);
        }

        const total = body.totalRecords ?? body.records.length;
        if (body.records.length < QUEUE_PAGE_SIZE || page * QUEUE_PAGE_SIZE >= total) break;
    }

    return items;
}

/** Refs with a `downloadFailed` history event since `since`. */
export async function fetchFailedSince(
    adapter: BaseAdapter,
    instance: ServiceInstance,
    refField: ArrRefField,
    since: Date
): Promise<number[]> {
    const path = '/api/v3/history/since';
    const response = await adapter.get(instance, path, {
        params: { date: since.toISOString(), eventType: 'downloadFailed' },
        timeout: 10000,
    });
    const records = parseResponse(z.array(historyRecordSchema), response.data, instance, path);

    const refs = new Set<number>();
    for (const record of records) {
        const ref = record[refField];
        if (ref !== undefined && record.eventType.toLowerCase() === 'downloadfailed') refs.add(ref);
    }
    return Array.from(refs);
}

export async function sendCommand(
    adapter: BaseAdapter,
    instance: ServiceInstance,
    body: { name: string } & Record<string, unknown>
): Promise<number> {
    const path = '/api/v3/command';
    const response = await adapter.post(instance, path, body);
    return parseResponse(commandSchema, response.data, instance, path).id;
}
