/**
 * Integration Adapter Error Types
 *
 * Every failure flowing through BaseAdapter is classified into one of
 * these codes so callers (the poller, webhook handlers) can decide
 * whether to retry next cycle or report the failure.
 *
 * @module server/integrations/errors
 */

import axios from 'axios';

// ============================================================================
// ERROR CODES
// ============================================================================

export type AdapterErrorCode =
    | 'CONFIG_INVALID'      // Missing URL, API key or token
    | 'AUTH_FAILED'         // 401/403
    | 'SERVICE_UNREACHABLE' // ECONNREFUSED, ETIMEDOUT
    | 'SERVICE_ERROR'       // 5xx
    | 'REQUEST_ERROR'       // Other HTTP errors (404, 400)
    | 'NETWORK_ERROR';      // DNS failure, TLS error

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'ECONNRESET']);

// ============================================================================
// ADAPTER ERROR CLASS
// ============================================================================

export class AdapterError extends Error {
    public readonly name = 'AdapterError';

    constructor(
        public readonly code: AdapterErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
    }

    /** HTTP status the service answered with, when it answered at all. */
    get status(): number | undefined {
        const status = this.context?.status;
        return typeof status === 'number' ? status : undefined;
    }
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

/**
 * Classify a raw error (typically from axios) into an AdapterError.
 */
export function classifyError(error: unknown, serviceName: string): AdapterError {
    if (error instanceof AdapterError) return error;

    if (!axios.isAxiosError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        return new AdapterError('NETWORK_ERROR', `Network error for ${serviceName}: ${message || 'Unknown error'}`, { serviceName });
    }

    const status = error.response?.status;
    if (status !== undefined) {
        if (status === 401 || status === 403) {
            return new AdapterError('AUTH_FAILED',
                `Authentication failed for ${serviceName} (HTTP ${status})`,
                { status, serviceName }
            );
        }
        if (status >= 500) {
            return new AdapterError('SERVICE_ERROR',
                `${serviceName} returned server error (HTTP ${status})`,
                { status, serviceName }
            );
        }
        return new AdapterError('REQUEST_ERROR',
            `${serviceName} request failed (HTTP ${status})`,
            { status, serviceName }
        );
    }

    if (error.code && UNREACHABLE_CODES.has(error.code)) {
        return new AdapterError('SERVICE_UNREACHABLE',
            `Cannot reach ${serviceName}: ${error.code}`,
            { code: error.code, serviceName }
        );
    }

    return new AdapterError('NETWORK_ERROR',
        `Network error for ${serviceName}: ${error.message || 'Unknown error'}`,
        { serviceName }
    );
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract a human-readable error message from any error type.
 */
export function extractAdapterErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
