/**
 * Endpoint Context
 * Identifies which API surface is asking for a value graph.
 * Rules receive it as the calling context; the masker never looks inside.
 */

export type EndpointContext = Readonly<{
    endpoint: string;       // e.g. 'GET /categories/:id' or a handler name
    method: string;         // HTTP verb, upper case
    path: string;           // request path as received
    requestId?: string;
}>;

/**
 * Narrow an opaque calling context to an EndpointContext.
 */
export function isEndpointContext(value: unknown): value is EndpointContext {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const candidate = value as Record<string, unknown>;
    return typeof candidate.endpoint === 'string'
        && typeof candidate.method === 'string'
        && typeof candidate.path === 'string';
}
