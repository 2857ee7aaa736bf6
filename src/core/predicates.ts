/**
 * Predicate library - named boolean tests used by rule conditions
 *
 * Each predicate resolves its property through the resolver and compares
 * with the shared operators. Missing properties and unparseable inputs
 * map to a fixed result; nothing here throws.
 */

import type { Element, Predicate, ResolveOptions, RuleValue, Scalar } from './types';
import { findProperty } from './property-resolver';
import {
  compareValues,
  matchesPrefixPattern,
  parseNumberFromString,
  similarityRatio,
  stringify,
  toNumber,
} from '../operators';

export const DEFAULT_FUZZY_THRESHOLD = 0.8;

const TRUE_STRINGS = ['yes', 'true', '1'];
const FALSE_STRINGS = ['no', 'false', '0'];

function lookup(element: Element, path: string, options?: ResolveOptions): unknown {
  const { found, value } = findProperty(element, path, options);
  return found ? value : undefined;
}

function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function isList(value: RuleValue): value is readonly Scalar[] {
  return Array.isArray(value);
}

function asScalar(value: RuleValue): Scalar {
  return isList(value) ? value.join(',') : value;
}

function parseThreshold(value: RuleValue): number | null {
  const scalar = asScalar(value);
  if (typeof scalar !== 'string' && typeof scalar !== 'number') return null;
  try {
    return parseNumberFromString(scalar);
  } catch {
    return null;
  }
}

export function propertyExists(element: Element, path: string, _value?: RuleValue, options?: ResolveOptions): boolean {
  return findProperty(element, path, options).found;
}

/**
 * Loose equality: identical values, or two primitives with the same string form
 */
export function isParameterValue(element: Element, path: string, value: RuleValue, options?: ResolveOptions): boolean {
  const actual = lookup(element, path, options);
  const expected = asScalar(value);

  if (actual === expected) return true;
  if (isMissing(actual) || isMissing(expected) || typeof actual === 'object') return false;

  return String(actual) === String(expected);
}

/**
 * True when the numeric value exceeds the threshold.
 * The predicate describes the passing state; it does not invert.
 */
export function isGreaterThan(element: Element, path: string, threshold: RuleValue, options?: ResolveOptions): boolean {
  const actual = toNumber(lookup(element, path, options));
  const limit = parseThreshold(threshold);
  if (actual === null || limit === null) return false;
  return actual > limit;
}

export function isLessThan(element: Element, path: string, threshold: RuleValue, options?: ResolveOptions): boolean {
  const actual = toNumber(lookup(element, path, options));
  const limit = parseThreshold(threshold);
  if (actual === null || limit === null) return false;
  return actual < limit;
}

/**
 * Inclusive range check, range written as "min,max"
 */
export function isInRange(element: Element, path: string, range: RuleValue, options?: ResolveOptions): boolean {
  const bounds: readonly Scalar[] = isList(range) ? range : String(asScalar(range)).split(',');
  if (bounds.length !== 2) return false;

  const [min, max] = bounds.map(bound => parseThreshold(bound));
  const actual = toNumber(lookup(element, path, options));
  if (min === null || max === null || actual === null) return false;

  return min <= actual && actual <= max;
}

/**
 * Membership in a literal list or a comma-separated string.
 * Matches either the value itself or its string form.
 */
export function isInList(element: Element, path: string, list: RuleValue, options?: ResolveOptions): boolean {
  const actual = lookup(element, path, options);
  if (isMissing(actual)) return false;

  const candidates: readonly Scalar[] = isList(list)
    ? list
    : isMissing(list)
      ? []
      : String(list)
          .split(',')
          .map(item => item.trim())
          .filter(item => item !== '');

  const actualString = stringify(actual);
  return candidates.some(candidate => candidate === actual || candidate === actualString);
}

export function isEqualValue(element: Element, path: string, value: RuleValue, options?: ResolveOptions): boolean {
  const actual = lookup(element, path, options);
  if (isMissing(actual)) return false;
  return compareValues(actual, asScalar(value), { allowYesNo: true, exact: false });
}

export function isNotEqualValue(element: Element, path: string, value: RuleValue, options?: ResolveOptions): boolean {
  const actual = lookup(element, path, options);
  if (isMissing(actual)) return true;
  return !compareValues(actual, asScalar(value), { allowYesNo: true, exact: false });
}

/**
 * Strict comparison against the stored value: no Yes/No conversion,
 * case-sensitive, exact numbers.
 */
export function isIdenticalValue(element: Element, path: string, value: RuleValue, options?: ResolveOptions): boolean {
  const { found, value: leaf } = findProperty(element, path, { ...options, raw: true });
  if (!found) return false;

  const actual = storedValue(leaf);
  if (isMissing(actual)) return false;

  return compareValues(actual, asScalar(value), {
    caseSensitive: true,
    tolerance: 0,
    allowYesNo: false,
    exact: true,
  });
}

export function isNotIdenticalValue(element: Element, path: string, value: RuleValue, options?: ResolveOptions): boolean {
  const { found } = findProperty(element, path, options);
  if (!found) return true;
  return !isIdenticalValue(element, path, value, options);
}

function storedValue(leaf: unknown): unknown {
  if (leaf instanceof Map) return leaf.has('value') ? leaf.get('value') : leaf;
  if (typeof leaf === 'object' && leaf !== null && !Array.isArray(leaf) && 'value' in leaf) {
    return leaf.value;
  }
  return leaf;
}

function matchesBoolean(value: unknown, target: boolean): boolean {
  if (typeof value === 'boolean') return value === target;
  if (typeof value === 'string') {
    return (target ? TRUE_STRINGS : FALSE_STRINGS).includes(value.toLowerCase());
  }
  return false;
}

/**
 * `true` for boolean true or "yes" / "true" / "1".
 * Not the complement of `isFalse`: other values fail both.
 */
export function isTrue(element: Element, path: string, _value?: RuleValue, options?: ResolveOptions): boolean {
  return matchesBoolean(lookup(element, path, options), true);
}

export function isFalse(element: Element, path: string, _value?: RuleValue, options?: ResolveOptions): boolean {
  return matchesBoolean(lookup(element, path, options), false);
}

export interface LikeOptions extends ResolveOptions {
  fuzzy?: boolean;
  threshold?: number;
}

/**
 * Regex prefix match, or edit-distance similarity when `fuzzy`
 */
export function isLike(element: Element, path: string, pattern: RuleValue, options: LikeOptions = {}): boolean {
  const { fuzzy = false, threshold = DEFAULT_FUZZY_THRESHOLD, ...resolveOptions } = options;
  const actual = lookup(element, path, resolveOptions);
  if (isMissing(actual) || isMissing(pattern)) return false;

  const text = stringify(actual);
  const expected = String(asScalar(pattern));

  if (fuzzy) {
    return similarityRatio(text, expected) >= threshold;
  }
  return matchesPrefixPattern(text, expected);
}

export function isFuzzyLike(element: Element, path: string, pattern: RuleValue, options?: ResolveOptions): boolean {
  return isLike(element, path, pattern, { ...options, fuzzy: true });
}

/**
 * Case-insensitive substring test
 */
export function contains(element: Element, path: string, substring: RuleValue, options?: ResolveOptions): boolean {
  const actual = lookup(element, path, options);
  if (isMissing(actual)) return false;
  const needle = isMissing(substring) ? '' : String(asScalar(substring));
  return stringify(actual).toLowerCase().includes(needle.toLowerCase());
}

export function notContains(element: Element, path: string, substring: RuleValue, options?: ResolveOptions): boolean {
  return !contains(element, path, substring, options);
}

export function isNotEmpty(element: Element, path: string, _value?: RuleValue, options?: ResolveOptions): boolean {
  const actual = lookup(element, path, options);
  if (isMissing(actual)) return false;
  if (typeof actual === 'string') {
    const trimmed = actual.trim();
    return trimmed !== '' && trimmed !== 'None';
  }
  return true;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Sheet-facing predicate names. Lookups are trimmed and case-insensitive.
 */
export const PREDICATES: Readonly<Record<string, Predicate>> = {
  'exists': propertyExists,
  'matches': isParameterValue,
  'greater than': isGreaterThan,
  'less than': isLessThan,
  'in range': isInRange,
  'in list': isInList,
  'equals': isEqualValue,
  'identical': isIdenticalValue,
  'not equal': isNotEqualValue,
  'not identical': isNotIdenticalValue,
  'true': isTrue,
  'false': isFalse,
  'is like': isLike,
  'fuzzy like': isFuzzyLike,
  'contains': contains,
  'does not contain': notContains,
  'not empty': isNotEmpty,
};

export function normalizePredicateName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function resolvePredicate(name: string): Predicate | undefined {
  const key = normalizePredicateName(name);
  return Object.prototype.hasOwnProperty.call(PREDICATES, key) ? PREDICATES[key] : undefined;
}

/** Stand-in for an unknown predicate name: every element fails it */
export const unknownPredicate: Predicate = () => false;
