import { AsyncLocalStorage } from 'node:async_hooks';
import type { EndpointContext } from "./endpoint.js";

/**
 * Mask Scope Container
 * AsyncLocalStorage-backed so concurrent requests never see each other's endpoint.
 *
 * Only the request boundary (the JSON mask middleware) should call run().
 * Downstream code reads the scope with current().
 */

const storage = new AsyncLocalStorage<EndpointContext>();

export class MaskScope {
    /**
     * Establish the calling endpoint for a request lifecycle.
     * Supports both sync and async functions.
     */
    public static run<T>(
        context: EndpointContext,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...context }), fn);
    }

    /**
     * Current endpoint context, or undefined outside run().
     * Masking without a scope simply evaluates rules with no context.
     */
    public static current(): EndpointContext | undefined {
        return storage.getStore();
    }

    /**
     * Like current(), but throws outside run().
     */
    public static require(): EndpointContext {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error("MISSING_MASK_SCOPE: No endpoint scope established for this call");
        }
        return ctx;
    }
}
