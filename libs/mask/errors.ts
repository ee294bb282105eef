/**
 * Masking errors.
 * Every error aborts the whole mask() call; the partially masked clone is dropped.
 */

export type MaskErrorCode =
    | 'MASK_CLONE_FAILED'
    | 'MASK_INTROSPECTION_FAILED'
    | 'MASK_DEPTH_EXCEEDED';

export class MaskError extends Error {
    readonly code: MaskErrorCode;
    readonly statusCode: number = 500;
    /** Dotted path from the root to the offending node, e.g. `$.children[1].name` */
    readonly path: string;

    constructor(code: MaskErrorCode, path: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MaskError';
        this.code = code;
        this.path = path;
        Object.setPrototypeOf(this, MaskError.prototype);
    }
}

/**
 * A node could not be copied into an independent graph.
 */
export class CloneError extends MaskError {
    readonly typeName: string;

    constructor(typeName: string, path: string, options?: { cause?: unknown }) {
        super('MASK_CLONE_FAILED', path, `Cannot clone ${typeName} at ${path}`, options);
        this.name = 'CloneError';
        this.typeName = typeName;
        Object.setPrototypeOf(this, CloneError.prototype);
    }
}

/**
 * A member accessor threw while being read or written.
 */
export class IntrospectionError extends MaskError {
    readonly member: string;
    readonly operation: 'read' | 'write';

    constructor(member: string, operation: 'read' | 'write', path: string, options?: { cause?: unknown }) {
        super('MASK_INTROSPECTION_FAILED', path, `Cannot ${operation} member "${member}" at ${path}`, options);
        this.name = 'IntrospectionError';
        this.member = member;
        this.operation = operation;
        Object.setPrototypeOf(this, IntrospectionError.prototype);
    }
}

export class MaskDepthExceededError extends MaskError {
    readonly maxDepth: number;

    constructor(maxDepth: number, path: string) {
        super('MASK_DEPTH_EXCEEDED', path, `Value graph deeper than ${maxDepth} levels at ${path}`);
        this.name = 'MaskDepthExceededError';
        this.maxDepth = maxDepth;
        Object.setPrototypeOf(this, MaskDepthExceededError.prototype);
    }
}
