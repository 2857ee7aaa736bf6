/**
 * Rule Evaluator - Core engine for checking elements against rule groups
 *
 * Each group runs as a small pipeline: structure check, filter chain over
 * the full element sequence, then the final check over the survivors.
 * Groups never share state, so one malformed group cannot affect another.
 */

import type {
  Condition,
  Element,
  EvaluationResult,
  PropertyMatchMode,
  RuleEngine,
  RuleGroup,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from './types';
import { validateRuleStructure } from './rule-table';
import { findProperty } from './property-resolver';
import { PREDICATES, resolvePredicate } from './predicates';
import { RuleStructureError, errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';

export interface EngineOptions {
  matchMode?: PropertyMatchMode;
  logger?: Logger;
}

export interface FiltersAndCheck {
  filters: Condition[];
  check: Condition;
}

/**
 * Separate a group's filters from its final check.
 *
 * An explicit CHECK row is the check. Older sheets without one use their
 * last AND row; a group made of a WHERE row alone checks that same row.
 */
export function splitFiltersAndCheck(conditions: readonly Condition[]): FiltersAndCheck | null {
  if (conditions.length === 0) return null;

  const explicit = conditions.findIndex(condition => condition.logic === 'CHECK');
  if (explicit !== -1) {
    return {
      filters: conditions.filter((_, index) => index !== explicit),
      check: conditions[explicit],
    };
  }

  let lastAnd = -1;
  conditions.forEach((condition, index) => {
    if (condition.logic === 'AND') lastAnd = index;
  });

  if (lastAnd !== -1) {
    return {
      filters: conditions.filter((_, index) => index !== lastAnd),
      check: conditions[lastAnd],
    };
  }

  return { filters: [...conditions], check: conditions[0] };
}

function skipped(ruleId: string, error?: string): EvaluationResult {
  return error === undefined
    ? { ruleId, passed: [], failed: [], outcome: 'skipped' }
    : { ruleId, passed: [], failed: [], outcome: 'skipped', error };
}

/**
 * Evaluate one rule group over the element sequence
 */
export function evaluateRuleGroup(
  elements: readonly Element[],
  group: RuleGroup,
  options: EngineOptions = {}
): EvaluationResult {
  const { matchMode = 'strict' } = options;
  const log = options.logger ?? defaultLogger;
  const resolveOptions = { matchMode };

  try {
    validateRuleStructure(group);
  } catch (error) {
    if (!(error instanceof RuleStructureError)) throw error;
    log.warn('Skipping malformed rule', { ruleId: group.ruleId, error: error.message });
    return skipped(group.ruleId, error.message);
  }

  const split = splitFiltersAndCheck(group.conditions);
  if (split === null) return skipped(group.ruleId);

  let working: Element[] = [...elements];
  for (const filter of split.filters) {
    working = working.filter(element =>
      filter.test(element, filter.propertyPath, filter.value, resolveOptions)
    );
    if (working.length === 0) {
      log.debug('No elements left after filter', { ruleId: group.ruleId, row: filter.row });
      return skipped(group.ruleId);
    }
  }

  const { check } = split;
  const passed: Element[] = [];
  const failed: Element[] = [];

  for (const element of working) {
    if (check.test(element, check.propertyPath, check.value, resolveOptions)) {
      passed.push(element);
    } else {
      failed.push(element);
    }
  }

  if (passed.length === 0 && failed.length === 0) return skipped(group.ruleId);

  log.debug('Rule evaluated', { ruleId: group.ruleId, passed: passed.length, failed: failed.length });

  return { ruleId: group.ruleId, passed, failed, outcome: 'evaluated' };
}

/**
 * Validate a rule group: grammar errors, plus warnings for names
 * and paths that will never match anything in this model
 */
function validateGroup(
  group: RuleGroup,
  elements: readonly Element[],
  matchMode: PropertyMatchMode
): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (group.conditions.length === 0) {
    errors.push({
      path: `rules[${group.ruleId}].conditions`,
      message: 'Rule must have at least one condition',
    });
  }

  try {
    validateRuleStructure(group);
  } catch (error) {
    if (error instanceof RuleStructureError) {
      errors.push({
        path: `rules[${group.ruleId}]`,
        message: error.message,
        condition: error.condition,
      });
    } else {
      errors.push({ path: `rules[${group.ruleId}]`, message: errorMessage(error) });
    }
  }

  group.conditions.forEach((condition, i) => {
    const path = `rules[${group.ruleId}].conditions[${i}]`;

    if (resolvePredicate(condition.predicateName) === undefined) {
      warnings.push({
        path: `${path}.predicate`,
        message: `Predicate "${condition.predicateName}" is not recognised`,
        suggestion: `Available: ${Object.keys(PREDICATES).join(', ')}`,
      });
    }

    if (condition.propertyPath === '') {
      warnings.push({
        path: `${path}.property`,
        message: 'Property path is empty',
      });
    } else if (
      elements.length > 0 &&
      !elements.some(element => findProperty(element, condition.propertyPath, { matchMode }).found)
    ) {
      warnings.push({
        path: `${path}.property`,
        message: `Property "${condition.propertyPath}" not found on any element`,
        suggestion: matchMode === 'strict' ? 'Try the fuzzy or mixed property match mode' : undefined,
      });
    }
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Create a rule engine instance over a flat element sequence
 */
export function createRuleEngine(elements: readonly Element[], options: EngineOptions = {}): RuleEngine {
  const { matchMode = 'strict' } = options;

  return {
    elements,

    evaluate(group: RuleGroup): EvaluationResult {
      return evaluateRuleGroup(elements, group, options);
    },

    evaluateAll(groups: readonly RuleGroup[]): Map<string, EvaluationResult> {
      const results = new Map<string, EvaluationResult>();
      for (const group of groups) {
        results.set(group.ruleId, this.evaluate(group));
      }
      return results;
    },

    validate(group: RuleGroup): ValidationResult {
      return validateGroup(group, elements, matchMode);
    },
  };
}
