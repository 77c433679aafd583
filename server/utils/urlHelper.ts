/**
 * URL Helper Utility
 * Normalizes configured service URLs and derives their ports
 */

/**
 * Strip trailing slashes so paths can be appended with a leading '/'.
 */
export function normalizeBaseUrl(url: string): string {
    return url.trim().replace(/\/+$/, '');
}

/**
 * Port a URL points at: the explicit port, else the scheme default
 * (80 for http, 443 for https). Returns null for unparseable input.
 */
export function portOf(url: string): number | null {
    try {
        const parsed = new URL(url);
        if (parsed.port) return parseInt(parsed.port, 10);
        if (parsed.protocol === 'https:') return 443;
        if (parsed.protocol === 'http:') return 80;
        return null;
    } catch {
        return null;
    }
}
