import type { JSONPath } from 'jsonc-parser';
import type { JsonValue } from '../types';
import { isJsonObject } from '../types';

/**
 * A value in the bundle together with its JSON path (for source positions)
 * and its FHIRPath-style location (for messages).
 */
export interface ElementNode {
  value: JsonValue;
  jsonPath: JSONPath;
  location: string;
}

function isChoiceName(name: string): boolean {
  return name.endsWith('[x]');
}

function matchesName(key: string, name: string): boolean {
  if (!isChoiceName(name)) return key === name;
  const stem = name.slice(0, -3);
  return key.startsWith(stem) && /^[A-Z]/.test(key.slice(stem.length));
}

/**
 * Children of `parent` named `name`. Arrays yield one node per item; a
 * choice name such as `value[x]` matches `valueString`, `valueQuantity`, ...
 */
export function childElements(parent: ElementNode, name: string): ElementNode[] {
  if (!isJsonObject(parent.value)) return [];

  const children: ElementNode[] = [];
  for (const [key, value] of Object.entries(parent.value)) {
    if (!matchesName(key, name)) continue;
    if (Array.isArray(value)) {
      value.forEach((item, index) => {
        children.push({
          value: item,
          jsonPath: [...parent.jsonPath, key, index],
          location: `${parent.location}.${key}[${index}]`,
        });
      });
    } else {
      children.push({ value, jsonPath: [...parent.jsonPath, key], location: `${parent.location}.${key}` });
    }
  }
  return children;
}

/**
 * All nodes reached from `root` by an element path such as `Patient.name.given`.
 * The first segment names the root type and is skipped.
 */
export function selectElements(root: ElementNode, elementPath: string): ElementNode[] {
  const segments = elementPath.split('.').slice(1);
  let current = [root];
  for (const segment of segments) {
    current = current.flatMap((node) => childElements(node, segment));
    if (current.length === 0) break;
  }
  return current;
}

/**
 * Splits `Patient.name.given` into its parent path and last segment.
 */
export function splitElementPath(elementPath: string): { parentPath: string; name: string } {
  const dot = elementPath.lastIndexOf('.');
  return { parentPath: elementPath.slice(0, dot), name: elementPath.slice(dot + 1) };
}
