import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';
import type { PolicyName } from '../mask/types.js';

/**
 * Masking configuration, read from the environment.
 * Every variable is optional.
 */
export const MaskEnvSchema = z.object({
    MASK_DEFAULT_POLICY: z.string().trim().min(1).optional(),
    MASK_MAX_DEPTH: z.coerce.number().int().positive().default(256),
    MASK_MEMBER_CACHE_SIZE: z.coerce.number().int().positive().default(500)
});

export interface MaskConfig {
    /** Policy used when a call names none */
    readonly defaultPolicy: PolicyName;
    /** Deepest nesting a value graph may have before masking aborts */
    readonly maxDepth: number;
    /** Number of prototypes whose accessor tables stay cached */
    readonly memberCacheSize: number;
}

export function loadMaskConfig(env: NodeJS.ProcessEnv = process.env): MaskConfig {
    const parsed = validate(MaskEnvSchema, env, 'mask-config');
    return Object.freeze({
        defaultPolicy: parsed.MASK_DEFAULT_POLICY ?? null,
        maxDepth: parsed.MASK_MAX_DEPTH,
        memberCacheSize: parsed.MASK_MEMBER_CACHE_SIZE
    });
}
