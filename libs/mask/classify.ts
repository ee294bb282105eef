import type { DeclaringType, NodeShape } from './types.js';

/**
 * Built-in objects that are values, not structures. Never descended into.
 */
const OPAQUE_TYPES: readonly DeclaringType[] = [
    Date,
    RegExp,
    Error,
    Promise,
    WeakMap,
    WeakSet,
    WeakRef,
    ArrayBuffer,
    SharedArrayBuffer,
    URL,
    URLSearchParams,
    Number,
    String,
    Boolean
];

function isOpaqueObject(value: object): boolean {
    if (ArrayBuffer.isView(value)) {
        return true;
    }
    return OPAQUE_TYPES.some(type => value instanceof type);
}

/**
 * True for primitives, functions, null/undefined and opaque built-ins.
 */
export function isOpaque(value: unknown): boolean {
    if (typeof value !== 'object' || value === null) {
        return true;
    }
    return isOpaqueObject(value);
}

/**
 * Constructor of a node, `Object` when it has none.
 */
export function typeOf(node: object): DeclaringType {
    const proto: unknown = Object.getPrototypeOf(node);
    if (typeof proto !== 'object' || proto === null) {
        return Object;
    }
    const ctor: unknown = Reflect.get(proto, 'constructor');
    return typeof ctor === 'function' ? ctor : Object;
}

export function typeName(value: unknown): string {
    if (typeof value !== 'object' || value === null) {
        return value === null ? 'null' : typeof value;
    }
    return typeOf(value).name || 'anonymous';
}

export function classifyNode(value: unknown): NodeShape {
    if (typeof value !== 'object' || value === null || isOpaqueObject(value)) {
        return { kind: 'scalar', value };
    }
    if (Array.isArray(value) || value instanceof Set || value instanceof Map) {
        return { kind: 'sequence', sequence: value };
    }
    return { kind: 'composite', node: value, type: typeOf(value) };
}
