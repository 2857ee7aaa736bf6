/**
 * Property Resolver - locates a value inside a schema-ambiguous element
 *
 * Paths are normalized (schema prefixes dropped, case ignored) and then
 * matched directly from the element root, falling back to a depth-first
 * search that retries the match at every nested record. Legacy flat
 * `parameters` and current nested `properties.Parameters` layouts are
 * handled by the same algorithm.
 */

import type { Container, Element, PropertyLookup, PropertyMatchMode, ResolveOptions } from './types';
import { convertYesNo } from '../operators';

const SCHEMA_SEGMENTS = new Set(['properties', 'parameters']);

const NOT_FOUND: PropertyLookup = { found: false, value: undefined };

function isMap(value: unknown): value is ReadonlyMap<string, unknown> {
  return value instanceof Map;
}

export function isContainer(value: unknown): value is Container {
  if (isMap(value)) return true;
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function entriesOf(container: Container): Array<[string, unknown]> {
  if (isMap(container)) {
    return Array.from(container.entries());
  }
  return Object.entries(container);
}

function memberOf(container: Container, key: string): unknown {
  return isMap(container) ? container.get(key) : container[key];
}

function hasMember(container: Container, key: string): boolean {
  return isMap(container) ? container.has(key) : Object.prototype.hasOwnProperty.call(container, key);
}

/**
 * Split a path into segments, dropping `properties` / `parameters`
 *
 * @example
 * normalizePath('properties.Parameters.Type Parameters.Construction.Width')
 * // ['Type Parameters', 'Construction', 'Width']
 */
export function normalizePath(path: string): string[] {
  return path
    .split('.')
    .filter(segment => segment !== '' && !SCHEMA_SEGMENTS.has(segment.toLowerCase()));
}

function keyMatches(key: string, segment: string, mode: 'equal' | 'contains'): boolean {
  const lowerKey = key.toLowerCase();
  const lowerSegment = segment.toLowerCase();
  return mode === 'equal' ? lowerKey === lowerSegment : lowerKey.includes(lowerSegment);
}

/**
 * Find the child of `container` addressed by one path segment.
 * Keys are tried first; a child record whose `name` equals the segment
 * (legacy parameter display name) is the fallback.
 */
function matchSegment(
  container: Container,
  segment: string,
  matchMode: PropertyMatchMode
): PropertyLookup {
  const entries = entriesOf(container);
  const modes: Array<'equal' | 'contains'> =
    matchMode === 'strict' ? ['equal'] : matchMode === 'fuzzy' ? ['contains'] : ['equal', 'contains'];

  for (const mode of modes) {
    for (const [key, child] of entries) {
      if (keyMatches(key, segment, mode)) {
        return { found: true, value: child };
      }
    }

    for (const [, child] of entries) {
      if (!isContainer(child)) continue;
      const name = memberOf(child, 'name');
      if (typeof name === 'string' && keyMatches(name, segment, mode)) {
        return { found: true, value: child };
      }
    }
  }

  return NOT_FOUND;
}

/**
 * Walk `segments` from `root`; every segment must resolve
 */
export function searchPath(
  root: unknown,
  segments: readonly string[],
  matchMode: PropertyMatchMode = 'strict'
): PropertyLookup {
  let current: unknown = root;

  for (const segment of segments) {
    if (!isContainer(current)) return NOT_FOUND;
    const step = matchSegment(current, segment, matchMode);
    if (!step.found) return NOT_FOUND;
    current = step.value;
  }

  return { found: true, value: current };
}

/**
 * Reduce a matched leaf to the value predicates compare against:
 * parameter records yield their `value`, primitives yield themselves,
 * Yes/No strings become booleans.
 */
export function extractValue(leaf: unknown, raw = false): unknown {
  if (raw) return leaf;

  if (isContainer(leaf)) {
    return hasMember(leaf, 'value') ? convertYesNo(memberOf(leaf, 'value')) : leaf;
  }

  if (Array.isArray(leaf)) return leaf;

  return convertYesNo(leaf);
}

/**
 * Find a property by path: direct match first, then depth-first search
 * through nested records (children before siblings, first match wins).
 */
export function findProperty(element: unknown, path: string, options: ResolveOptions = {}): PropertyLookup {
  const { raw = false, matchMode = 'strict' } = options;
  const segments = normalizePath(path);

  if (segments.length === 0) return NOT_FOUND;

  const visited = new Set<object>();

  const traverse = (node: unknown): PropertyLookup => {
    if (!isContainer(node) || visited.has(node)) return NOT_FOUND;
    visited.add(node);

    const direct = searchPath(node, segments, matchMode);
    if (direct.found) {
      return { found: true, value: extractValue(direct.value, raw) };
    }

    for (const [key, child] of entriesOf(node)) {
      if (key.startsWith('_') || !isContainer(child)) continue;
      const nested = traverse(child);
      if (nested.found) return nested;
    }

    return NOT_FOUND;
  };

  return traverse(element);
}

export function hasParameter(element: Element, path: string, options: ResolveOptions = {}): boolean {
  return findProperty(element, path, options).found;
}

export function getParameterValue(
  element: Element,
  path: string,
  defaultValue: unknown = undefined,
  options: ResolveOptions = {}
): unknown {
  const { found, value } = findProperty(element, path, options);
  return found ? value : defaultValue;
}

/**
 * Schema generation of a received model root (defaults to 2)
 */
export function detectSchemaVersion(root: Element): number {
  const version = root['version'];
  if (typeof version === 'number' && Number.isFinite(version)) return version;
  if (typeof version === 'string' && /^\d+$/.test(version.trim())) return parseInt(version, 10);
  return 2;
}
