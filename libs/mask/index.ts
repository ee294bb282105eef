/**
 * Masking engine public exports.
 */

// Types
export type { DeclaringType, MaskCallOptions, MaskRule, NodeShape, PolicyName, SequenceNode } from './types.js';

// Clone Boundary
export { CLONE, cloneGraph, cloneGraphWithSources } from './clone.js';
export type { Cloneable, CloneChild, GraphCopyResult } from './clone.js';

// Classification & member tables
export { classifyNode, isOpaque, typeOf } from './classify.js';
export { MemberTable } from './memberTable.js';
export type { Member, PropertyMember, FieldMember } from './memberTable.js';

// Rules
export { MaskRegistry, defaultMaskRegistry } from './registry.js';
export type { MaskRuleMap } from './registry.js';
export { maskWhen, maskAlways, maskUnless } from './conditions.js';
export type { MaskWhenOptions } from './conditions.js';

// Walker
export { Masker, getDefaultMasker, mask } from './masker.js';
export type { MaskerOptions } from './masker.js';

// Errors
export { MaskError, CloneError, IntrospectionError, MaskDepthExceededError } from './errors.js';
export type { MaskErrorCode } from './errors.js';
