/**
 * Path Resolver
 *
 * Selector grammar:
 *   path    := segment ('/' segment)*
 *   segment := '.' | name
 *
 * '.' stays on the context element (used to read an element's own
 * attributes or text); a name descends to the first child element with
 * that name. Array iteration over same-named siblings is done by the
 * array processor through `findNodes()`, never by `findNode()`.
 */

import { InvalidRootConfiguration } from './errors.js';
import type { BuildNode, GroveNode } from './grove/index.js';

export interface SelfSegment {
  readonly kind: 'self';
}

export interface NamedSegment {
  readonly kind: 'named';
  readonly name: string;
}

export type PathSegment = SelfSegment | NamedSegment;

/**
 * Parsed selector. Never empty.
 */
export type PathExpression = readonly [PathSegment, ...PathSegment[]];

const SELF: SelfSegment = Object.freeze({ kind: 'self' });

const NAME_PATTERN = /^[A-Za-z_\u00C0-\uFFFF][A-Za-z0-9_.\-\u00B7\u00C0-\uFFFF]*$/;

/**
 * Parse a selector string
 *
 * @throws InvalidRootConfiguration on an empty path, an empty segment or
 *   a segment that is not an element name
 */
export function parsePath(text: string): PathExpression {
  if (text === '') {
    throw new InvalidRootConfiguration('Empty path', '');
  }

  const segments = text.split('/').map((part): PathSegment => {
    if (part === '.') {
      return SELF;
    }
    if (!NAME_PATTERN.test(part)) {
      throw new InvalidRootConfiguration(`Invalid path segment "${part}" in path "${text}"`, text);
    }
    return Object.freeze({ kind: 'named', name: part });
  });

  const [first, ...rest] = segments;
  const expression: PathExpression = [first, ...rest];
  return Object.freeze(expression);
}

/**
 * Render a path for locations and messages. Self segments are dropped.
 */
export function renderPath(path: readonly PathSegment[]): string {
  return namesOf(path).join('/');
}

/**
 * Names of the named segments, in order
 */
export function namesOf(path: readonly PathSegment[]): string[] {
  const names: string[] = [];
  for (const segment of path) {
    if (segment.kind === 'named') {
      names.push(segment.name);
    }
  }
  return names;
}

/**
 * Name of the last segment, or undefined when it is a self segment
 */
export function lastName(path: PathExpression): string | undefined {
  const last = path[path.length - 1];
  return last.kind === 'named' ? last.name : undefined;
}

/**
 * True when the path only ever refers to the context element
 */
export function isSelfPath(path: readonly PathSegment[]): boolean {
  return path.every(segment => segment.kind === 'self');
}

/**
 * Resolve a path for reading
 *
 * Returns null as soon as a named step has no matching child.
 */
export function findNode(context: GroveNode, path: readonly PathSegment[]): GroveNode | null {
  let current: GroveNode | null = context;
  for (const segment of path) {
    if (current === null) {
      return null;
    }
    if (segment.kind === 'named') {
      current = current.child(segment.name);
    }
  }
  return current;
}

/**
 * Resolve every segment but the last, then return all children matching
 * the last one (the items of an array)
 */
export function findNodes(context: GroveNode, path: PathExpression): GroveNode[] {
  const last = path[path.length - 1];
  const parent = findNode(context, path.slice(0, -1));
  if (parent === null) {
    return [];
  }
  return last.kind === 'named' ? parent.children(last.name) : [parent];
}

/**
 * Resolve a path for writing, creating missing elements
 *
 * Existing children are reused so that several values can share an
 * element (attributes plus text, or `a/b` next to `a/c`).
 */
export function ensureNode(context: BuildNode, path: readonly PathSegment[]): BuildNode {
  let current = context;
  for (const segment of path) {
    if (segment.kind === 'named') {
      current = current.child(segment.name) ?? current.appendChild(segment.name);
    }
  }
  return current;
}

/**
 * Like `ensureNode()` for all but the last segment, then always append
 * a fresh element for the last one (one element per array item)
 */
export function appendNode(context: BuildNode, path: PathExpression): BuildNode {
  const last = path[path.length - 1];
  const parent = ensureNode(context, path.slice(0, -1));
  return last.kind === 'named' ? parent.appendChild(last.name) : parent;
}
