/**
 * Error types raised by the rule engine and its boundary
 */

import type { Condition } from './core/types';

/**
 * A rule group breaks the WHERE/AND/CHECK grammar.
 * Recovered per group: the group contributes no results.
 */
export class RuleStructureError extends Error {
  readonly ruleId: string;
  readonly condition?: Condition;

  constructor(ruleId: string, message: string, condition?: Condition) {
    super(message);
    this.name = 'RuleStructureError';
    this.ruleId = ruleId;
    this.condition = condition;
  }
}

/**
 * The rule table as a whole cannot be processed (missing columns, unreadable source)
 */
export class RuleTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuleTableError';
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
