import { typeName } from './classify.js';
import { CloneError } from './errors.js';

/**
 * Method key a class implements to control how its instances are copied.
 * The method receives a function that copies children within the same graph copy
 * (shared references and cycles below it stay shared).
 * An instance must not be reachable again through the children it copies.
 *
 * Classes with `#private` fields need this hook: the default copy is built with
 * Object.create and has no private slots, so their accessors fail on it.
 */
export const CLONE: unique symbol = Symbol.for('response-mask.clone');

export type CloneChild = <U>(value: U) => U;

export interface Cloneable {
    [CLONE](cloneChild: CloneChild): object;
}

/**
 * Copying these would either lose state or share a live resource.
 */
const UNCOPYABLE: readonly Function[] = [WeakMap, WeakSet, WeakRef, Promise, SharedArrayBuffer];

function isCloneable(value: object): value is Cloneable {
    return CLONE in value && typeof value[CLONE] === 'function';
}

/**
 * Clone Boundary.
 * Produces a copy of a value graph that shares no object with the input.
 * Prototypes, property descriptors (as writable data), shared references and cycles are kept.
 * Functions are shared; they are code, not data.
 */
class GraphCopy {
    private readonly memo = new Map<object, object>();

    copy<U>(value: U, path: string): U {
        // Each branch of copyNode rebuilds a value of the type it was given.
        return this.copyNode(value, path) as U;
    }

    private copyNode(value: unknown, path: string): unknown {
        if (typeof value !== 'object' || value === null) {
            return value;
        }

        const seen = this.memo.get(value);
        if (seen) {
            return seen;
        }

        if (UNCOPYABLE.some(type => value instanceof type)) {
            throw new CloneError(typeName(value), path);
        }

        if (isCloneable(value)) {
            let copied: object;
            try {
                copied = value[CLONE](child => this.copy(child, `${path}.*`));
            } catch (err) {
                throw new CloneError(typeName(value), path, { cause: err });
            }
            this.memo.set(value, copied);
            return copied;
        }

        if (Buffer.isBuffer(value)) {
            return this.remember(value, Buffer.from(value));
        }
        if (value instanceof URL) {
            return this.remember(value, new URL(value.href));
        }
        if (value instanceof URLSearchParams) {
            return this.remember(value, new URLSearchParams(value));
        }
        if (
            value instanceof Date ||
            value instanceof RegExp ||
            value instanceof Error ||
            value instanceof ArrayBuffer ||
            ArrayBuffer.isView(value) ||
            value instanceof Number ||
            value instanceof String ||
            value instanceof Boolean
        ) {
            let copied: object;
            try {
                copied = structuredClone(value);
            } catch (err) {
                throw new CloneError(typeName(value), path, { cause: err });
            }
            // structuredClone yields the base built-in; subclasses get their prototype and own state back.
            Object.setPrototypeOf(copied, Object.getPrototypeOf(value));
            this.remember(value, copied);
            this.copyOwnProperties(value, copied, path);
            return copied;
        }

        if (Array.isArray(value)) {
            const items: unknown[] = new Array(value.length);
            Object.setPrototypeOf(items, Object.getPrototypeOf(value));
            this.memo.set(value, items);
            value.forEach((item: unknown, index) => {
                items[index] = this.copyNode(item, `${path}[${index}]`);
            });
            return items;
        }

        if (value instanceof Map) {
            const entries = new Map<unknown, unknown>();
            Object.setPrototypeOf(entries, Object.getPrototypeOf(value));
            this.memo.set(value, entries);
            for (const [key, item] of value) {
                entries.set(this.copyNode(key, `${path}<key>`), this.copyNode(item, `${path}[${String(key)}]`));
            }
            return entries;
        }

        if (value instanceof Set) {
            const members = new Set<unknown>();
            Object.setPrototypeOf(members, Object.getPrototypeOf(value));
            this.memo.set(value, members);
            let index = 0;
            for (const item of value) {
                members.add(this.copyNode(item, `${path}{${index++}}`));
            }
            return members;
        }

        return this.copyObject(value, path);
    }

    private copyObject(value: object, path: string): object {
        const target: object = Object.create(Object.getPrototypeOf(value));
        this.memo.set(value, target);
        this.copyOwnProperties(value, target, path);
        return target;
    }

    private copyOwnProperties(value: object, target: object, path: string): void {
        const indexed = ArrayBuffer.isView(value);

        for (const key of Reflect.ownKeys(value)) {
            // Typed array elements were copied with the buffer.
            if (indexed && typeof key === 'string' && /^\d+$/.test(key)) continue;

            const descriptor = Object.getOwnPropertyDescriptor(value, key);
            if (!descriptor) continue;

            const existing = Object.getOwnPropertyDescriptor(target, key);
            if ('value' in descriptor) {
                const copied = this.copyNode(descriptor.value, `${path}.${String(key)}`);
                if (existing && !existing.configurable) {
                    // Built-in slots such as RegExp#lastIndex or String indices
                    if (existing.writable) Reflect.set(target, key, copied);
                    continue;
                }
                Object.defineProperty(target, key, {
                    value: copied,
                    enumerable: descriptor.enumerable,
                    writable: true,
                    configurable: true
                });
            } else if (!existing) {
                Object.defineProperty(target, key, descriptor);
            }
        }
    }

    sources(): Map<object, object> {
        const sources = new Map<object, object>();
        for (const [original, copied] of this.memo) {
            sources.set(copied, original);
        }
        return sources;
    }

    private remember(original: object, copied: object): object {
        this.memo.set(original, copied);
        return copied;
    }
}

/**
 * A graph copy together with the source of every object in it.
 */
export interface GraphCopyResult<T> {
    readonly copy: T;
    /** Copied object -> the input object it was made from */
    readonly sources: ReadonlyMap<object, object>;
}

/**
 * Like cloneGraph, also reporting where each copied object came from.
 */
export function cloneGraphWithSources<T>(data: T, rootPath = '$'): GraphCopyResult<T> {
    const graph = new GraphCopy();
    const copy = graph.copy(data, rootPath);
    return { copy, sources: graph.sources() };
}

/**
 * Deep copy of a value graph with no sub-object shared with the input.
 * Throws CloneError when a node cannot be copied; nothing is returned in that case.
 */
export function cloneGraph<T>(data: T): T {
    return new GraphCopy().copy(data, '$');
}
