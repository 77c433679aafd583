import { BaseAdapter } from '../BaseAdapter';
import type { ServiceInstance } from '../types';

// ============================================================================
// SONARR ADAPTER
// ============================================================================

export class SonarrAdapter extends BaseAdapter {
    readonly testEndpoint = '/api/v3/system/status';

    validateConfig(instance: ServiceInstance): boolean {
        return !!(instance.config.url && instance.config.apiKey);
    }

    getAuthHeaders(instance: ServiceInstance): Record<string, string> {
        return { 'X-Api-Key': instance.config.apiKey ?? '' };
    }
}
