/**
 * HTTP Options for BaseAdapter requests
 *
 * Shared type used by get(), post(), put() and request().
 *
 * @module server/integrations/httpTypes
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpOpts {
    /** Request timeout in milliseconds (default: 15000) */
    timeout?: number;
    /** URL query parameters */
    params?: Record<string, unknown>;
    /** Additional headers merged with auth headers */
    headers?: Record<string, string>;
}
