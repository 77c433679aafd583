/**
 * Quality Router
 *
 * Decides which quality tier a unit belongs to and resolves the backend,
 * library folder and catalog section serving that tier.
 *
 * @module server/services/monitoring/qualityRouter
 */

import path from 'path';
import type { Settings, TierSettings } from '../../config/settings';
import type { MediaKind, QualityTier } from './types';

export interface TierRoute extends TierSettings {
    kind: MediaKind;
    tier: QualityTier;
}

export interface QualityHints {
    /** Path of the file the event refers to. */
    filePath?: string | null;
    /** Source port of the webhook that delivered the event. */
    sourcePort?: number | null;
}

function isInside(filePath: string, folder: string): boolean {
    const relative = path.relative(path.resolve(folder), path.resolve(filePath));
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export class QualityRouter {
    constructor(private readonly settings: Settings) { }

    /**
     * High quality when the tier is configured for `kind` and either the
     * file lives under the high-quality library folder or the webhook came
     * from the high-quality backend's port.
     */
    detectTier(kind: MediaKind, hints: QualityHints): QualityTier {
        const high = this.settings.media[kind].high;
        if (!high) return 'standard';

        if (hints.filePath && isInside(hints.filePath, high.libraryFolder)) {
            return 'high';
        }
        if (hints.sourcePort != null && high.backend.port !== null && hints.sourcePort === high.backend.port) {
            return 'high';
        }
        return 'standard';
    }

    /** Route for a tier; a missing high tier falls back to standard. */
    route(kind: MediaKind, tier: QualityTier): TierRoute {
        const media = this.settings.media[kind];
        if (tier === 'high' && media.high) {
            return { ...media.high, kind, tier: 'high' };
        }
        return { ...media.standard, kind, tier: 'standard' };
    }
}
