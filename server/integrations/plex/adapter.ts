import { BaseAdapter } from '../BaseAdapter';
import type { ServiceInstance, TestResult } from '../types';
import { extractAdapterErrorMessage } from '../errors';

// ============================================================================
// PLEX ADAPTER
// ============================================================================

export class PlexAdapter extends BaseAdapter {
    readonly testEndpoint = '/identity';

    validateConfig(instance: ServiceInstance): boolean {
        return !!(instance.config.url && instance.config.token);
    }

    getAuthHeaders(instance: ServiceInstance): Record<string, string> {
        return {
            'X-Plex-Token': instance.config.token ?? '',
            'Accept': 'application/json',
        };
    }

    /**
     * Plex reports its version in the `x-plex-version` header rather than
     * the JSON body.
     */
    async testConnection(instance: ServiceInstance): Promise<TestResult> {
        try {
            const response = await this.get(instance, this.testEndpoint, { timeout: 5000 });
            const header: unknown = response.headers['x-plex-version'];
            return {
                success: true,
                message: 'Connection successful',
                version: typeof header === 'string' ? header : undefined,
            };
        } catch (error) {
            return {
                success: false,
                error: extractAdapterErrorMessage(error),
            };
        }
    }
}
