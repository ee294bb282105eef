import { LRUCache } from 'lru-cache';

/**
 * Accessor declared on a prototype or on the instance itself.
 */
export interface PropertyMember {
    readonly kind: 'property';
    readonly name: string;
    readonly get?: () => unknown;
    readonly set?: (value: unknown) => void;
}

/**
 * Own data property of the instance.
 */
export interface FieldMember {
    readonly kind: 'field';
    readonly name: string;
}

export type Member = PropertyMember | FieldMember;

const SKIPPED_NAMES = new Set(['constructor', '__proto__']);

function accessorsOf(target: object, seen: Set<string>): PropertyMember[] {
    const accessors: PropertyMember[] = [];
    for (const name of Object.getOwnPropertyNames(target)) {
        if (seen.has(name) || SKIPPED_NAMES.has(name)) continue;
        seen.add(name);

        const descriptor = Object.getOwnPropertyDescriptor(target, name);
        if (!descriptor || 'value' in descriptor) continue;

        accessors.push({
            kind: 'property',
            name,
            get: descriptor.get,
            set: descriptor.set
        });
    }
    return accessors;
}

/**
 * Member tables per type.
 * The accessor part of a table comes from the prototype chain and is built once per prototype.
 * Fields are own data properties, so they are read from each instance.
 * Properties come first; a field sharing a property's name is not listed.
 */
export class MemberTable {
    private readonly prototypes: LRUCache<object, readonly PropertyMember[]>;

    constructor(maxTypes: number) {
        this.prototypes = new LRUCache<object, readonly PropertyMember[]>({ max: maxTypes });
    }

    membersOf(node: object): Member[] {
        const ownAccessors = accessorsOf(node, new Set<string>());
        const ownAccessorNames = new Set(ownAccessors.map(member => member.name));

        const inherited = this.prototypeAccessors(node).filter(member => !ownAccessorNames.has(member.name));
        const properties: PropertyMember[] = [...ownAccessors, ...inherited];
        const propertyNames = new Set(properties.map(member => member.name));

        const fields: FieldMember[] = [];
        for (const name of Object.getOwnPropertyNames(node)) {
            if (propertyNames.has(name)) continue;
            const descriptor = Object.getOwnPropertyDescriptor(node, name);
            if (descriptor && 'value' in descriptor) {
                fields.push({ kind: 'field', name });
            }
        }

        return [...properties, ...fields];
    }

    /**
     * Number of prototypes with a cached accessor table.
     */
    get size(): number {
        return this.prototypes.size;
    }

    private prototypeAccessors(node: object): readonly PropertyMember[] {
        const proto: unknown = Object.getPrototypeOf(node);
        if (typeof proto !== 'object' || proto === null || proto === Object.prototype) {
            return [];
        }

        const cached = this.prototypes.get(proto);
        if (cached) {
            return cached;
        }

        const seen = new Set<string>();
        const accessors: PropertyMember[] = [];
        let current: unknown = proto;
        while (typeof current === 'object' && current !== null && current !== Object.prototype) {
            accessors.push(...accessorsOf(current, seen));
            current = Object.getPrototypeOf(current);
        }

        const table = Object.freeze(accessors);
        this.prototypes.set(proto, table);
        return table;
    }
}
