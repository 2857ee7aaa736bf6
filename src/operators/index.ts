/**
 * Value comparison operators for rule evaluation
 *
 * These operators hold the coercion rules shared by every predicate:
 * Yes/No and true/false strings as booleans, numeric strings as numbers,
 * tolerance-based float equality and pattern/fuzzy string matching.
 */

import { isDeepStrictEqual } from 'node:util';

export interface CompareOptions {
  caseSensitive?: boolean;
  tolerance?: number;
  allowYesNo?: boolean;
  /** Exact numeric equality instead of tolerance */
  exact?: boolean;
}

export const DEFAULT_TOLERANCE = 1e-6;

const NUMERIC_STRING = /^-?(\d+\.?\d*|\.\d+)$/;
const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * Convert Yes/No strings (any case) to booleans; other values pass through
 */
export function convertYesNo(value: unknown): unknown {
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    if (lower === 'yes') return true;
    if (lower === 'no') return false;
  }
  return value;
}

/**
 * Interpret a value as a boolean, or return undefined when it is not one
 */
export function parseBooleanValue(value: unknown, allowYesNo = true): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;

  const lower = value.trim().toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  if (allowYesNo) {
    if (lower === 'yes') return true;
    if (lower === 'no') return false;
  }

  return undefined;
}

/**
 * Parse a plain numeric string ("-12", "3.50", " 7 ") to a number.
 * Anything else is returned unchanged.
 */
export function coerceNumericString(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return NUMERIC_STRING.test(trimmed) ? Number(trimmed) : value;
}

/**
 * Parse a threshold written in a rule: integer first, then float.
 *
 * @throws RangeError when the input is neither
 */
export function parseNumberFromString(input: string | number): number {
  if (typeof input === 'number') return input;

  const trimmed = input.trim();
  if (INTEGER_LITERAL.test(trimmed)) return parseInt(trimmed, 10);
  if (FLOAT_LITERAL.test(trimmed)) return parseFloat(trimmed);

  throw new RangeError(`"${input}" is not a valid integer or float`);
}

/**
 * Convert a property value to a float, or null when it has no numeric reading
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return FLOAT_LITERAL.test(trimmed) ? parseFloat(trimmed) : null;
  }
  return null;
}

/**
 * Compare two values with type-aware coercion. First matching step wins:
 *
 * 1. both sides read as booleans → boolean equality
 * 2. numeric strings become numbers
 * 3. two strings → (case-folded) string equality
 * 4. two numbers → exact or tolerance-bounded equality
 * 5. structural equality
 */
export function compareValues(value1: unknown, value2: unknown, options: CompareOptions = {}): boolean {
  const {
    caseSensitive = false,
    tolerance = DEFAULT_TOLERANCE,
    allowYesNo = true,
    exact = false,
  } = options;

  const bool1 = parseBooleanValue(value1, allowYesNo);
  const bool2 = parseBooleanValue(value2, allowYesNo);
  if (bool1 !== undefined && bool2 !== undefined) {
    return bool1 === bool2;
  }

  const left = coerceNumericString(value1);
  const right = coerceNumericString(value2);

  if (typeof left === 'string' && typeof right === 'string') {
    return caseSensitive ? left === right : left.toLowerCase() === right.toLowerCase();
  }

  if (typeof left === 'number' && typeof right === 'number') {
    if (exact) return left === right;
    return left === right || Math.abs(left - right) <= tolerance;
  }

  return isDeepStrictEqual(left, right);
}

/**
 * Regex match anchored at the start of the value only
 */
export function matchesPrefixPattern(value: string, pattern: string): boolean {
  try {
    return new RegExp(`^(?:${pattern})`).test(value);
  } catch {
    return false;
  }
}

/**
 * Insert/delete edit distance (no substitutions) between two strings
 */
export function indelDistance(a: string, b: string): number {
  let previous: number[] = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = [0];
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }

  const commonLength = previous[b.length];
  return a.length + b.length - 2 * commonLength;
}

/**
 * Similarity in [0, 1] from the indel distance; 1 means identical
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (total - indelDistance(a, b)) / total;
}

/**
 * String form used by substring, list and pattern predicates
 */
export function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value instanceof Map ? Object.fromEntries(value) : value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}
