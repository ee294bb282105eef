import type { DeclaringType, MaskRule } from './types.js';

type RuleList = readonly MaskRule[];

/**
 * Member names of T that can carry rules in a typed declaration.
 * Non-public members are declared through add().
 */
export type MaskRuleMap<T> = {
    readonly [K in keyof T & string]?: MaskRule | RuleList;
};

/**
 * Rule registry.
 * Maps (type, member name) to the rules attached to that member.
 * Rules declared on a base class apply to the same member on subclasses.
 */
export class MaskRegistry {
    private readonly rules = new Map<DeclaringType, Map<string, MaskRule[]>>();

    /**
     * Attach rules to one member of a type.
     */
    add(type: DeclaringType, member: string, ...rules: MaskRule[]): this {
        let members = this.rules.get(type);
        if (!members) {
            members = new Map();
            this.rules.set(type, members);
        }
        const existing = members.get(member) ?? [];
        members.set(member, [...existing, ...rules]);
        return this;
    }

    /**
     * Attach rules to several public members of a class at once.
     */
    define<T>(type: abstract new (...args: never[]) => T, members: MaskRuleMap<T>): this {
        const entries: Array<[string, MaskRule | RuleList | undefined]> = Object.entries(members);
        for (const [member, rules] of entries) {
            if (rules === undefined) continue;
            if (typeof rules === 'function') {
                this.add(type, member, rules);
            } else {
                this.add(type, member, ...rules);
            }
        }
        return this;
    }

    /**
     * Rules for a member of a type, including those declared on its ancestors.
     */
    rulesFor(type: DeclaringType, member: string): RuleList {
        const collected: MaskRule[] = [];
        let current: unknown = type;
        while (typeof current === 'function' && current !== Function.prototype) {
            const found = this.rules.get(current)?.get(member);
            if (found) {
                collected.push(...found);
            }
            current = Object.getPrototypeOf(current);
        }
        return collected;
    }

    /**
     * True when any rule is declared for the type or its ancestors.
     */
    covers(type: DeclaringType): boolean {
        let current: unknown = type;
        while (typeof current === 'function' && current !== Function.prototype) {
            if (this.rules.has(current)) return true;
            current = Object.getPrototypeOf(current);
        }
        return false;
    }

    clear(): void {
        this.rules.clear();
    }
}

/**
 * Process-wide registry used by the default masker.
 * Rules are declared once at startup, next to the entity classes they guard.
 */
export const defaultMaskRegistry = new MaskRegistry();
