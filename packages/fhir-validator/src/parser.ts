import { findNodeAtLocation, getNodeValue, parseTree, printParseErrorCode } from 'jsonc-parser';
import type { JSONPath, Node, ParseError } from 'jsonc-parser';
import { BundleParseError } from './errors';
import { isJsonObject } from './types';
import type { JsonObject } from './types';

export interface SourcePosition {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

/**
 * A parsed Bundle that still knows where each of its nodes sits in the
 * original text.
 */
export class BundleDocument {
  private readonly lineStarts: number[];

  constructor(
    readonly text: string,
    readonly root: Node,
    readonly value: JsonObject
  ) {
    this.lineStarts = computeLineStarts(text);
  }

  positionAt(offset: number): SourcePosition {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }

  /**
   * Position of the property (or array item) addressed by `path`. For a
   * property the position of its key is returned.
   */
  locate(path: JSONPath): SourcePosition | undefined {
    const node = findNodeAtLocation(this.root, path);
    if (!node) return undefined;
    const anchor = node.parent?.type === 'property' ? node.parent : node;
    return this.positionAt(anchor.offset);
  }
}

function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* \r */) {
      if (text.charCodeAt(i + 1) === 10) i++;
      starts.push(i + 1);
    } else if (ch === 10 /* \n */) {
      starts.push(i + 1);
    }
  }
  return starts;
}

export function parseBundleDocument(text: string): BundleDocument {
  if (text.trim() === '') {
    throw new BundleParseError('payload is empty');
  }

  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false });

  if (errors.length > 0 || !root) {
    const first = errors[0];
    if (!first) throw new BundleParseError('payload is not JSON');
    const lines = computeLineStarts(text.slice(0, first.offset));
    const column = first.offset - lines[lines.length - 1] + 1;
    throw new BundleParseError(
      `${printParseErrorCode(first.error)} at line ${lines.length}, column ${column}`
    );
  }

  const value: unknown = getNodeValue(root);
  if (!isJsonObject(value)) {
    throw new BundleParseError('root element must be a JSON object');
  }
  if (value.resourceType !== 'Bundle') {
    const found = typeof value.resourceType === 'string' ? value.resourceType : 'no resourceType';
    throw new BundleParseError(`expected resourceType 'Bundle' but found ${found}`);
  }

  return new BundleDocument(text, root, value);
}
