/**
 * Core masking types.
 */

/**
 * Runtime type of a composite node: its constructor.
 * Plain and null-prototype objects report `Object`.
 */
export type DeclaringType = Function;

/** Named rule set; null selects the default policy. */
export type PolicyName = string | null;

/**
 * Condition deciding whether a member is erased.
 * Receives the calling context untouched, the declaring type at the current depth and the active policy.
 */
export type MaskRule = (
    context: unknown,
    declaringType: DeclaringType,
    policyName: PolicyName
) => boolean;

export type SequenceNode = unknown[] | Set<unknown> | Map<unknown, unknown>;

/**
 * Closed classification of a value graph node.
 */
export type NodeShape =
    | { readonly kind: 'scalar'; readonly value: unknown }
    | { readonly kind: 'sequence'; readonly sequence: SequenceNode }
    | { readonly kind: 'composite'; readonly node: object; readonly type: DeclaringType };

export interface MaskCallOptions {
    /** Calling context handed to every rule; rules that need one never match without it */
    readonly context?: unknown;
    /** Active policy; undefined selects the configured default */
    readonly policy?: PolicyName;
}
