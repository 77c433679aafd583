/**
 * Service Registry
 *
 * Builds one client per configured service instance (standard and, where
 * configured, high-quality Radarr/Sonarr, plus Plex) and resolves the
 * backend for a (kind, tier) pair.
 */

import type { Settings } from '../config/settings';
import type { BackendClient, MediaKind, QualityTier } from '../services/monitoring/types';
import { PlexClient } from './plex/client';
import { RadarrClient } from './radarr/client';
import { SonarrClient } from './sonarr/client';
import type { ServiceInstance, TestResult } from './types';

export interface BackendPair<T> {
    standard: T;
    high: T | null;
}

export interface ServiceRegistry {
    radarr: BackendPair<RadarrClient>;
    sonarr: BackendPair<SonarrClient>;
    plex: PlexClient;
}

function instanceFor(type: 'radarr' | 'sonarr', tier: QualityTier, url: string, apiKey: string): ServiceInstance {
    const label = type === 'radarr' ? 'Radarr' : 'Sonarr';
    return {
        id: `${type}-${tier}`,
        type,
        name: tier === 'high' ? `${label} 4K` : label,
        config: { url, apiKey },
    };
}

export function createServiceRegistry(settings: Settings): ServiceRegistry {
    const movie = settings.media.movie;
    const episode = settings.media.episode;

    return {
        radarr: {
            standard: new RadarrClient(instanceFor('radarr', 'standard', movie.standard.backend.url, movie.standard.backend.apiKey)),
            high: movie.high
                ? new RadarrClient(instanceFor('radarr', 'high', movie.high.backend.url, movie.high.backend.apiKey))
                : null,
        },
        sonarr: {
            standard: new SonarrClient(instanceFor('sonarr', 'standard', episode.standard.backend.url, episode.standard.backend.apiKey)),
            high: episode.high
                ? new SonarrClient(instanceFor('sonarr', 'high', episode.high.backend.url, episode.high.backend.apiKey))
                : null,
        },
        plex: new PlexClient({
            id: 'plex',
            type: 'plex',
            name: 'Plex',
            config: { url: settings.plex.url, token: settings.plex.token },
        }),
    };
}

export function radarrFor(services: ServiceRegistry, tier: QualityTier): RadarrClient {
    return tier === 'high' && services.radarr.high ? services.radarr.high : services.radarr.standard;
}

export function sonarrFor(services: ServiceRegistry, tier: QualityTier): SonarrClient {
    return tier === 'high' && services.sonarr.high ? services.sonarr.high : services.sonarr.standard;
}

/** BackendResolver for the monitoring core. */
export function backendResolver(services: ServiceRegistry): (kind: MediaKind, tier: QualityTier) => BackendClient {
    return (kind, tier) => kind === 'movie' ? radarrFor(services, tier) : sonarrFor(services, tier);
}

/** Connectivity of every configured service, keyed by instance id. */
export async function testAllConnections(services: ServiceRegistry): Promise<Record<string, TestResult>> {
    const clients = [
        services.radarr.standard,
        services.radarr.high,
        services.sonarr.standard,
        services.sonarr.high,
    ].filter((client): client is RadarrClient | SonarrClient => client !== null);

    const results: Record<string, TestResult> = {};
    await Promise.all([
        ...clients.map(async client => {
            results[client.instance.id] = await client.testConnection();
        }),
        (async () => {
            results[services.plex.instance.id] = await services.plex.testConnection();
        })(),
    ]);
    return results;
}
