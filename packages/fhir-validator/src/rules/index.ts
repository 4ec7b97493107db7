/**
 * Instance Rules Index
 */

export * from './base-rule';
export * from './element-walker';
export * from './bundle-rules';
export * from './profile-rules';
export * from './terminology-rules';

import type { InstanceRule } from './base-rule';
import { BUNDLE_RULES } from './bundle-rules';
import { PROFILE_RULES } from './profile-rules';
import { TERMINOLOGY_RULES } from './terminology-rules';

/**
 * Default rule set, in execution order.
 */
export function getDefaultRules(): InstanceRule[] {
  return [...BUNDLE_RULES, ...PROFILE_RULES, ...TERMINOLOGY_RULES];
}
