/**
 * Tests for adapter error classification.
 */

import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { AdapterError, classifyError, extractAdapterErrorMessage } from '../integrations/errors';

// ============================================================================
// Test Data
// ============================================================================

const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };

function httpError(status: number): AxiosError {
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
        status,
        statusText: 'Error',
        headers: {},
        config,
        data: {},
    });
}

// ============================================================================
// Tests
// ============================================================================

describe('classifyError', () => {
    it('should classify auth failures', () => {
        const error = classifyError(httpError(401), 'Radarr');

        expect(error.code).toBe('AUTH_FAILED');
        expect(error.message).toBe('Authentication failed for Radarr (HTTP 401)');
        expect(error.status).toBe(401);
    });

    it('should classify server errors', () => {
        const error = classifyError(httpError(503), 'Sonarr');

        expect(error.code).toBe('SERVICE_ERROR');
        expect(error.status).toBe(503);
    });

    it('should classify other HTTP errors as request errors', () => {
        const error = classifyError(httpError(404), 'Plex');

        expect(error.code).toBe('REQUEST_ERROR');
        expect(error.message).toBe('Plex request failed (HTTP 404)');
    });

    it('should classify refused connections as unreachable', () => {
        const error = classifyError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config), 'Radarr');

        expect(error.code).toBe('SERVICE_UNREACHABLE');
        expect(error.message).toBe('Cannot reach Radarr: ECONNREFUSED');
        expect(error.status).toBeUndefined();
    });

    it('should classify anything else as a network error', () => {
        expect(classifyError(new Error('socket hang up'), 'Radarr').message).toBe('Network error for Radarr: socket hang up');
        expect(classifyError('boom', 'Radarr').code).toBe('NETWORK_ERROR');
    });

    it('should pass adapter errors through', () => {
        const original = new AdapterError('CONFIG_INVALID', 'Missing required configuration for radarr');

        expect(classifyError(original, 'Radarr')).toBe(original);
    });
});

describe('extractAdapterErrorMessage', () => {
    it('should read messages from errors and other values', () => {
        expect(extractAdapterErrorMessage(new Error('nope'))).toBe('nope');
        expect(extractAdapterErrorMessage(42)).toBe('42');
    });
});
