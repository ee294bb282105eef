/**
 * JSON Mask Middleware
 *
 * Masks every JSON body a route sends, using the route as the calling context.
 * Mount it on the route (router.get(path, createJsonMaskMiddleware(...), handler))
 * so the matched route path is known when the endpoint name is derived.
 *
 * A body that fails to mask is never sent; the failure goes to next() as a MaskFailure.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import type { EndpointContext } from '../context/endpoint.js';
import { MaskScope } from '../context/requestContext.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getContextLogger } from '../logging/logger.js';
import { getDefaultMasker, Masker } from '../mask/masker.js';
import type { PolicyName } from '../mask/types.js';
import { validate } from '../validation/zod-middleware.js';

export interface JsonMaskMiddlewareOptions {
    /** Policy for every body sent through this route; undefined selects the default */
    policy?: PolicyName;
    /** Fixed endpoint name, or a function deriving one from the request */
    endpoint?: string | ((req: Request) => string);
    masker?: Masker;
}

const OptionsSchema = z.object({
    policy: z.string().min(1).nullable().optional(),
    endpoint: z.union([z.string().min(1), z.function()]).optional()
});

function routePath(req: Request): string {
    const route: unknown = req.route;
    if (typeof route === 'object' && route !== null) {
        const path: unknown = Reflect.get(route, 'path');
        if (typeof path === 'string') {
            return `${req.baseUrl}${path}`;
        }
    }
    return `${req.baseUrl}${req.path}`;
}

export function buildEndpointContext(
    req: Request,
    endpoint?: string | ((req: Request) => string)
): EndpointContext {
    let name: string;
    if (typeof endpoint === 'string') {
        name = endpoint;
    } else if (endpoint) {
        name = endpoint(req);
    } else {
        name = `${req.method} ${routePath(req)}`;
    }

    const requestId = req.get('x-request-id');
    return {
        endpoint: name,
        method: req.method,
        path: req.originalUrl || req.path,
        ...(requestId !== undefined && { requestId })
    };
}

/**
 * Express Middleware Factory
 */
export function createJsonMaskMiddleware(options: JsonMaskMiddlewareOptions = {}): RequestHandler {
    validate(OptionsSchema, { policy: options.policy, endpoint: options.endpoint }, 'json-mask-middleware');

    return (req: Request, res: Response, next: NextFunction): void => {
        const context = buildEndpointContext(req, options.endpoint);
        const masker = options.masker ?? getDefaultMasker();
        const send = res.json.bind(res);

        res.json = (body?: unknown) => {
            let masked: unknown;
            try {
                masked = masker.mask(body, { context, policy: options.policy });
            } catch (error) {
                next(ErrorSanitizer.sanitize(error, context.endpoint));
                return res;
            }
            return send(masked);
        };

        getContextLogger(context).debug({
            event: 'JSON_MASK_SCOPE_OPENED',
            policy: options.policy ?? masker.config.defaultPolicy
        });

        void MaskScope.run(context, () => next());
    };
}
