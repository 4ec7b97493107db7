/**
 * Base Instance Rule Interface
 *
 * Rules inspect a parsed bundle and return zero or more messages. They run in
 * order; a rule that throws is reported by the validator and the run goes on.
 */

import type { StructureDefinition } from '../conformance';
import type { BundleDocument } from '../parser';
import type { ValidationSupport } from '../support/validation-support';
import type { IssueSeverity, IssueType, ValidationMessage } from '../types';
import type { ElementNode } from './element-walker';

export interface BundleEntryNode {
  index: number;
  entry: ElementNode;
  resource?: ElementNode;
  resourceType?: string;
  fullUrl?: string;
}

/**
 * A resource (the bundle itself or an entry resource) and the structure
 * definitions it is checked against.
 */
export interface ValidationTarget {
  resource: ElementNode;
  resourceType: string;
  definitions: StructureDefinition[];
}

/**
 * Context provided to rules during validation
 */
export interface RuleContext {
  document: BundleDocument;
  bundle: ElementNode;
  /** Bundle.type when it is a string */
  bundleType?: string;
  entries: BundleEntryNode[];
  targets: ValidationTarget[];
  /** Root of the support chain */
  support: ValidationSupport;
}

export interface InstanceRule {
  /** Unique rule identifier */
  name: string;

  /** Human-readable description */
  description: string;

  validate(context: RuleContext): ValidationMessage[];
}

/**
 * Build a message located at `node` (or at the bundle root).
 */
export function createMessage(
  rule: Pick<InstanceRule, 'name'>,
  context: Pick<RuleContext, 'document'>,
  severity: IssueSeverity,
  type: IssueType,
  message: string,
  node?: ElementNode
): ValidationMessage {
  const position = context.document.locate(node?.jsonPath ?? []);
  return {
    ruleName: rule.name,
    severity,
    type,
    message,
    location: node?.location ?? 'Bundle',
    line: position?.line,
    column: position?.column,
  };
}
