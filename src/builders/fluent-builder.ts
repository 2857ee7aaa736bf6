/**
 * Fluent Builder API for constructing rule groups in code
 *
 * Produces the same `RuleGroup` a rule sheet would, so hand-written rules
 * and sheet rules go through one evaluator:
 *
 * @example
 * const rule = RuleBuilder
 *   .rule('1')
 *   .where('category').matches('Walls')
 *   .and('Instance Parameters.Structural.Structural').isTrue()
 *   .check('width').greaterThan(200)
 *   .withMessage('Wall width ok')
 *   .withSeverity('Warning')
 *   .build();
 */

import type { Condition, Logic, RuleGroup, RuleValue, Scalar, Severity } from '../core/types';
import { resolvePredicate, unknownPredicate } from '../core/predicates';

/**
 * Condition builder - picks the predicate for one row
 */
class ConditionBuilder {
  private builder: RuleBuilderImpl;
  private logic: Logic;
  private propertyPath: string;

  constructor(builder: RuleBuilderImpl, logic: Logic, propertyPath: string) {
    this.builder = builder;
    this.logic = logic;
    this.propertyPath = propertyPath;
  }

  exists(): RuleBuilderImpl {
    return this.predicate('exists');
  }

  matches(value: Scalar): RuleBuilderImpl {
    return this.predicate('matches', value);
  }

  equals(value: Scalar): RuleBuilderImpl {
    return this.predicate('equals', value);
  }

  notEqual(value: Scalar): RuleBuilderImpl {
    return this.predicate('not equal', value);
  }

  identical(value: Scalar): RuleBuilderImpl {
    return this.predicate('identical', value);
  }

  notIdentical(value: Scalar): RuleBuilderImpl {
    return this.predicate('not identical', value);
  }

  greaterThan(value: number | string): RuleBuilderImpl {
    return this.predicate('greater than', value);
  }

  lessThan(value: number | string): RuleBuilderImpl {
    return this.predicate('less than', value);
  }

  inRange(min: number, max: number): RuleBuilderImpl {
    return this.predicate('in range', `${min},${max}`);
  }

  inList(items: readonly Scalar[]): RuleBuilderImpl {
    return this.predicate('in list', items);
  }

  isTrue(): RuleBuilderImpl {
    return this.predicate('true');
  }

  isFalse(): RuleBuilderImpl {
    return this.predicate('false');
  }

  isLike(pattern: string): RuleBuilderImpl {
    return this.predicate('is like', pattern);
  }

  fuzzyLike(text: string): RuleBuilderImpl {
    return this.predicate('fuzzy like', text);
  }

  contains(substring: string): RuleBuilderImpl {
    return this.predicate('contains', substring);
  }

  doesNotContain(substring: string): RuleBuilderImpl {
    return this.predicate('does not contain', substring);
  }

  notEmpty(): RuleBuilderImpl {
    return this.predicate('not empty');
  }

  /**
   * Any predicate by its sheet name
   */
  predicate(name: string, value: RuleValue = null): RuleBuilderImpl {
    this.builder.addCondition(this.logic, this.propertyPath, name, value);
    return this.builder;
  }
}

/**
 * Main rule builder implementation
 */
class RuleBuilderImpl {
  private ruleId: string;
  private message = 'No Message';
  private severity: Severity = 'Error';
  private conditions: Condition[] = [];

  constructor(ruleId: string) {
    this.ruleId = ruleId;
  }

  /**
   * Add a condition (used internally)
   */
  addCondition(logic: Logic, propertyPath: string, predicateName: string, value: RuleValue): this {
    this.conditions.push({
      ruleId: this.ruleId,
      row: this.conditions.length,
      logic,
      propertyPath,
      predicateName,
      value,
      test: resolvePredicate(predicateName) ?? unknownPredicate,
    });
    return this;
  }

  where(propertyPath: string): ConditionBuilder {
    return new ConditionBuilder(this, 'WHERE', propertyPath);
  }

  and(propertyPath: string): ConditionBuilder {
    return new ConditionBuilder(this, 'AND', propertyPath);
  }

  check(propertyPath: string): ConditionBuilder {
    return new ConditionBuilder(this, 'CHECK', propertyPath);
  }

  withMessage(message: string): this {
    this.message = message;
    return this;
  }

  withSeverity(severity: Severity): this {
    this.severity = severity;
    return this;
  }

  build(): RuleGroup {
    return {
      ruleId: this.ruleId,
      conditions: [...this.conditions],
      message: this.message,
      severity: this.severity,
    };
  }
}

/**
 * Static entry point for the fluent builder
 */
export const RuleBuilder = {
  rule(ruleId: string | number): RuleBuilderImpl {
    return new RuleBuilderImpl(String(ruleId));
  },
};

export type { RuleBuilderImpl as RuleBuilderType, ConditionBuilder as ConditionBuilderType };
