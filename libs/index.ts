export * from './mask/index.js';

export { MaskScope } from './context/requestContext.js';
export { isEndpointContext } from './context/endpoint.js';
export type { EndpointContext } from './context/endpoint.js';

export { createJsonMaskMiddleware, buildEndpointContext } from './http/jsonMaskMiddleware.js';
export type { JsonMaskMiddlewareOptions } from './http/jsonMaskMiddleware.js';

export { MaskFailure, ErrorSanitizer } from './errors/sanitizer.js';
export { loadMaskConfig } from './config/maskConfig.js';
export type { MaskConfig } from './config/maskConfig.js';

export { Paging } from './linq/paging.js';
export { logger } from './logging/logger.js';
