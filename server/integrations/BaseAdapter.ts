/**
 * Base Adapter: abstract HTTP Client for Service Integrations
 *
 * Radarr, Sonarr and Plex adapters extend this class. It provides:
 * - Centralized HTTP methods (get, post, put, request)
 * - Config validation before every request
 * - Structured error classification (AdapterError)
 * - testConnection() for the startup connectivity report
 *
 * Adapters override testEndpoint, getAuthHeaders() and, where they need
 * more than a URL, validateConfig().
 *
 * @module server/integrations/BaseAdapter
 */

import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import logger from '../utils/logger';
import { normalizeBaseUrl } from '../utils/urlHelper';
import type { ServiceInstance, TestResult } from './types';
import type { HttpMethod, HttpOpts } from './httpTypes';
import { AdapterError, classifyError, extractAdapterErrorMessage } from './errors';

const DEFAULT_TIMEOUT_MS = 15000;

// ============================================================================
// BASE ADAPTER
// ============================================================================

export abstract class BaseAdapter {
    /** Endpoint to call for testConnection (e.g., '/api/v3/system/status') */
    abstract readonly testEndpoint: string;

    /** Return auth headers for requests. */
    abstract getAuthHeaders(instance: ServiceInstance): Record<string, string>;

    /**
     * Validate that the instance has required config fields.
     * Default: requires config.url to be set.
     */
    validateConfig(instance: ServiceInstance): boolean {
        return !!instance.config.url;
    }

    getBaseUrl(instance: ServiceInstance): string {
        return normalizeBaseUrl(instance.config.url);
    }

    /**
     * Extract version info from the test endpoint's response.
     * Default: looks for data.version.
     */
    protected parseTestResponse(data: unknown): { version?: string } {
        if (data && typeof data === 'object' && 'version' in data && typeof data.version === 'string') {
            return { version: data.version };
        }
        return {};
    }

    // ========================================================================
    // CORE HTTP METHODS (throw AdapterError on failure)
    // ========================================================================

    async get(instance: ServiceInstance, path: string, opts?: HttpOpts): Promise<AxiosResponse<unknown>> {
        return this.request(instance, 'GET', path, undefined, opts);
    }

    async post(instance: ServiceInstance, path: string, body?: unknown, opts?: HttpOpts): Promise<AxiosResponse<unknown>> {
        return this.request(instance, 'POST', path, body, opts);
    }

    async put(instance: ServiceInstance, path: string, body?: unknown, opts?: HttpOpts): Promise<AxiosResponse<unknown>> {
        return this.request(instance, 'PUT', path, body, opts);
    }

    /**
     * Core HTTP request method. Validates config, builds URL + headers,
     * calls axios, classifies errors.
     *
     * @throws AdapterError on any failure
     */
    async request(
        instance: ServiceInstance,
        method: HttpMethod,
        path: string,
        body?: unknown,
        opts?: HttpOpts
    ): Promise<AxiosResponse<unknown>> {
        if (!this.validateConfig(instance)) {
            throw new AdapterError('CONFIG_INVALID',
                `Missing required configuration for ${instance.type}`,
                { instanceId: instance.id, type: instance.type }
            );
        }

        const config: AxiosRequestConfig = {
            method,
            url: `${this.getBaseUrl(instance)}${path}`,
            headers: {
                ...this.getAuthHeaders(instance),
                ...opts?.headers,
            },
            params: opts?.params,
            data: body,
            timeout: opts?.timeout ?? DEFAULT_TIMEOUT_MS,
        };

        logger.debug(`[Adapter:${instance.type}] ${method} ${path}`, { instanceId: instance.id });

        try {
            return await axios.request<unknown>(config);
        } catch (error) {
            const adapterError = classifyError(error, instance.name);
            // Transient network trouble is warn-level, the poller retries next cycle
            const logLevel = adapterError.code === 'SERVICE_UNREACHABLE' || adapterError.code === 'NETWORK_ERROR'
                ? 'warn' : 'error';
            logger[logLevel](
                `[Adapter:${instance.type}] ${adapterError.code}: ${adapterError.message}`,
                { instanceId: instance.id, path, status: adapterError.status }
            );
            throw adapterError;
        }
    }

    // ========================================================================
    // CONNECTIVITY
    // ========================================================================

    async testConnection(instance: ServiceInstance): Promise<TestResult> {
        try {
            const response = await this.get(instance, this.testEndpoint, { timeout: 5000 });
            const { version } = this.parseTestResponse(response.data);
            return {
                success: true,
                message: 'Connection successful',
                version,
            };
        } catch (error) {
            return {
                success: false,
                error: extractAdapterErrorMessage(error),
            };
        }
    }
}
