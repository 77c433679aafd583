/**
 * Integration Types
 *
 * Runtime shapes shared by every service adapter: the configured service
 * instance an adapter talks to and the result of a connectivity check.
 */

export type ServiceType = 'radarr' | 'sonarr' | 'plex';

// ============================================================================
// SERVICE INSTANCE (runtime config)
// ============================================================================

export interface ServiceInstance {
    /** Stable id used in logs, e.g. `radarr-high`. */
    id: string;
    type: ServiceType;
    name: string;
    config: {
        url: string;
        apiKey?: string;
        token?: string;
    };
}

// ============================================================================
// TEST RESULT
// ============================================================================

export interface TestResult {
    success: boolean;
    message?: string;
    error?: string;
    version?: string; // Service version if detectable
}
