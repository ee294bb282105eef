import { isEndpointContext } from '../context/endpoint.js';
import type { DeclaringType, MaskRule, PolicyName } from './types.js';

/**
 * Declarative conditions for a member mask. Every listed condition must hold.
 */
export interface MaskWhenOptions {
    /** Active policy is one of these; null stands for the default policy */
    readonly policies?: readonly PolicyName[];
    /** Calling endpoint is one of these; a call without an endpoint context never matches */
    readonly endpoints?: readonly string[];
    /** Declaring type is one of these or a subclass of one */
    readonly declaringTypes?: readonly DeclaringType[];
}

function isSameOrSubclass(candidate: DeclaringType, base: DeclaringType): boolean {
    return candidate === base || Object.prototype.isPrototypeOf.call(base, candidate);
}

/**
 * Build a rule from declarative conditions.
 * With no conditions the rule always matches.
 */
export function maskWhen(options: MaskWhenOptions = {}): MaskRule {
    const policies = options.policies ? new Set(options.policies) : undefined;
    const endpoints = options.endpoints ? new Set(options.endpoints) : undefined;
    const declaringTypes = options.declaringTypes ? [...options.declaringTypes] : undefined;

    return (context, declaringType, policyName) => {
        if (policies && !policies.has(policyName)) {
            return false;
        }
        if (endpoints && !(isEndpointContext(context) && endpoints.has(context.endpoint))) {
            return false;
        }
        if (declaringTypes && !declaringTypes.some(type => isSameOrSubclass(declaringType, type))) {
            return false;
        }
        return true;
    };
}

export function maskAlways(): MaskRule {
    return maskWhen();
}

/**
 * Matches only when the inner rule does not. Useful for allow-listing one surface.
 */
export function maskUnless(rule: MaskRule): MaskRule {
    return (context, declaringType, policyName) => !rule(context, declaringType, policyName);
}
