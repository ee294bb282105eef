import type { Logger } from 'pino';
import { loadMaskConfig, type MaskConfig } from '../config/maskConfig.js';
import { isEndpointContext } from '../context/endpoint.js';
import { MaskScope } from '../context/requestContext.js';
import { getContextLogger } from '../logging/logger.js';
import { classifyNode, isOpaque, typeName } from './classify.js';
import { cloneGraphWithSources } from './clone.js';
import { CloneError, IntrospectionError, MaskDepthExceededError, MaskError } from './errors.js';
import { type Member, MemberTable } from './memberTable.js';
import { defaultMaskRegistry, MaskRegistry } from './registry.js';
import type { DeclaringType, MaskCallOptions, PolicyName, SequenceNode } from './types.js';

export interface MaskerOptions {
    registry?: MaskRegistry;
    config?: MaskConfig;
}

/**
 * A copy made without its private slots fails on first access to a `#private` member;
 * that is a copy failure, not a broken accessor.
 */
function accessFailure(node: object, member: Member, operation: 'read' | 'write', path: string, err: unknown): MaskError {
    if (err instanceof TypeError && /private member/.test(err.message)) {
        return new CloneError(typeName(node), path, { cause: err });
    }
    return new IntrospectionError(member.name, operation, path, { cause: err });
}

/**
 * One traversal over one cloned graph. Discarded when the call ends.
 */
class MaskPass {
    // node -> declaring types it has already been processed under
    private readonly visited = new Map<object, Set<DeclaringType | undefined>>();
    // copied node -> the unmasked input node it was made from
    private readonly sources: Map<object, object>;

    constructor(
        private readonly registry: MaskRegistry,
        private readonly members: MemberTable,
        private readonly context: unknown,
        private readonly policy: PolicyName,
        private readonly maxDepth: number,
        private readonly log: Logger,
        sources: ReadonlyMap<object, object>
    ) {
        this.sources = new Map(sources);
    }

    /**
     * Masks a node and returns what its parent must hold afterwards:
     * the node itself, or a separate copy when the node was already masked under another declaring type.
     */
    visit(node: unknown, inherited: DeclaringType | undefined, path: string, depth: number): unknown {
        const shape = classifyNode(node);

        switch (shape.kind) {
            case 'scalar':
                return node;

            case 'sequence': {
                const target = this.claim(shape.sequence, inherited, path, depth);
                if (target) {
                    this.visitSequence(target, inherited, path, depth);
                }
                return target ?? shape.sequence;
            }

            case 'composite': {
                const declaringType = inherited ?? shape.type;
                const target = this.claim(shape.node, declaringType, path, depth);
                if (target) {
                    this.visitComposite(target, shape.type, declaringType, path, depth);
                }
                return target ?? shape.node;
            }
        }
    }

    /**
     * Node to mask under `declaringType`, or undefined when that was already done.
     * A node reached again under a different declaring type is unshared: a fresh copy of its
     * unmasked source is masked in its place, so one path's erasures never show through another.
     */
    private claim<N extends object>(
        node: N,
        declaringType: DeclaringType | undefined,
        path: string,
        depth: number
    ): N | undefined {
        if (depth > this.maxDepth) {
            throw new MaskDepthExceededError(this.maxDepth, path);
        }

        const seenAs = this.visited.get(node);
        if (!seenAs) {
            this.visited.set(node, new Set([declaringType]));
            return node;
        }
        if (seenAs.has(declaringType)) {
            return undefined;
        }

        const unshared = this.unshare(node, path);
        this.visited.set(unshared, new Set([declaringType]));
        return unshared;
    }

    private unshare<N extends object>(node: N, path: string): N {
        // Nodes made by a CLONE hook without cloneChild have no recorded source; copy their current state.
        const source = this.sources.get(node) ?? node;
        const { copy, sources } = cloneGraphWithSources(source, path);
        for (const [copied, original] of sources) {
            this.sources.set(copied, this.sources.get(original) ?? original);
        }
        // The source has the same shape as the node it was copied into.
        return copy as N;
    }

    private visitSequence(sequence: SequenceNode, inherited: DeclaringType | undefined, path: string, depth: number): void {
        if (Array.isArray(sequence)) {
            for (let i = 0; i < sequence.length; i++) {
                sequence[i] = this.visit(sequence[i], inherited, `${path}[${i}]`, depth + 1);
            }
            return;
        }

        if (sequence instanceof Map) {
            for (const [key, value] of Array.from(sequence)) {
                sequence.set(key, this.visit(value, inherited, `${path}[${String(key)}]`, depth + 1));
            }
            return;
        }

        // Set members are masked in place; the set is only rebuilt, in order, when one was unshared.
        const before = Array.from(sequence);
        const after = before.map((value, index) => this.visit(value, inherited, `${path}{${index}}`, depth + 1));
        if (after.some((value, index) => value !== before[index])) {
            sequence.clear();
            after.forEach(value => sequence.add(value));
        }
    }

    private visitComposite(
        node: object,
        ownType: DeclaringType,
        declaringType: DeclaringType,
        path: string,
        depth: number
    ): void {
        let members: Member[];
        try {
            members = this.members.membersOf(node);
        } catch (err) {
            throw new IntrospectionError('*', 'read', path, { cause: err });
        }

        for (const member of members) {
            const memberPath = `${path}.${member.name}`;
            const rules = this.registry.rulesFor(ownType, member.name);

            if (rules.some(rule => rule(this.context, declaringType, this.policy))) {
                this.erase(node, member, ownType, memberPath);
                continue;
            }

            // A property without a setter could not take the masked value back.
            if (member.kind === 'property' && !member.set) {
                continue;
            }

            const value = this.read(node, member, memberPath);
            if (value === null || value === undefined || isOpaque(value)) {
                continue;
            }

            this.write(node, member, this.visit(value, ownType, memberPath, depth + 1), memberPath);
        }
    }

    private erase(node: object, member: Member, ownType: DeclaringType, path: string): void {
        if (member.kind === 'property' && !member.set) {
            this.log.debug({
                event: 'READ_ONLY_MEMBER_SKIPPED',
                type: ownType.name,
                member: member.name,
                path,
                policy: this.policy
            });
            return;
        }

        this.write(node, member, null, path);
        this.log.debug({
            event: 'MEMBER_ERASED',
            type: ownType.name,
            member: member.name,
            path,
            policy: this.policy
        });
    }

    private read(node: object, member: Member, path: string): unknown {
        try {
            if (member.kind === 'property') {
                return member.get ? member.get.call(node) : undefined;
            }
            const value: unknown = Reflect.get(node, member.name);
            return value;
        } catch (err) {
            throw accessFailure(node, member, 'read', path, err);
        }
    }

    private write(node: object, member: Member, value: unknown, path: string): void {
        let written: boolean;
        try {
            if (member.kind === 'property') {
                member.set?.call(node, value);
                written = member.set !== undefined;
            } else {
                written = Reflect.set(node, member.name, value);
            }
        } catch (err) {
            throw accessFailure(node, member, 'write', path, err);
        }
        if (!written) {
            throw new IntrospectionError(member.name, 'write', path);
        }
    }
}

/**
 * Recursive Mask Walker.
 *
 * Clones the input, then erases every member whose rules match the calling context
 * and policy, descending into members that are kept. The input is never modified.
 */
export class Masker {
    readonly registry: MaskRegistry;
    readonly config: MaskConfig;
    private readonly members: MemberTable;

    constructor(options: MaskerOptions = {}) {
        this.registry = options.registry ?? defaultMaskRegistry;
        this.config = options.config ?? loadMaskConfig();
        this.members = new MemberTable(this.config.memberCacheSize);
    }

    /**
     * Masked copy of `data`. null and undefined come back unchanged.
     */
    mask<T>(data: T, options: MaskCallOptions = {}): T {
        if (data === null || data === undefined) {
            return data;
        }

        const policy = options.policy === undefined ? this.config.defaultPolicy : options.policy;
        const log = getContextLogger(isEndpointContext(options.context) ? options.context : undefined);

        try {
            const { copy, sources } = cloneGraphWithSources(data);
            new MaskPass(this.registry, this.members, options.context, policy, this.config.maxDepth, log, sources)
                .visit(copy, undefined, '$', 0);
            return copy;
        } catch (err) {
            if (err instanceof MaskError) {
                log.error({ code: err.code, path: err.path, policy, err: err.cause }, err.message);
            }
            throw err;
        }
    }

    /**
     * Mask with the endpoint established by MaskScope, if any.
     */
    maskForCurrentRequest<T>(data: T, policy?: PolicyName): T {
        return this.mask(data, { context: MaskScope.current(), policy });
    }
}

let sharedMasker: Masker | undefined;

/**
 * Masker over the default registry and the environment configuration, created on first use.
 */
export function getDefaultMasker(): Masker {
    if (!sharedMasker) {
        sharedMasker = new Masker();
    }
    return sharedMasker;
}

export function mask<T>(data: T, policyName?: PolicyName): T;
export function mask<T>(data: T, context: unknown, policyName?: PolicyName): T;
export function mask<T>(data: T, contextOrPolicy?: unknown, policyName?: PolicyName): T {
    // mask(data, policy): a second and last argument that can only be a policy name
    if (arguments.length <= 2 && (contextOrPolicy === undefined || contextOrPolicy === null || typeof contextOrPolicy === 'string')) {
        return getDefaultMasker().mask(data, { policy: contextOrPolicy });
    }
    return getDefaultMasker().mask(data, { context: contextOrPolicy, policy: policyName });
}
