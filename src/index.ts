/**
 * Model Rule Checker - validate model elements against a rule sheet
 *
 * Rules are authored as WHERE/AND/CHECK rows in a spreadsheet. Each group
 * filters the flattened model elements, checks the survivors, and the
 * outcome is attached to the elements through a host context.
 *
 * @example
 * ```typescript
 * import { parseRuleSheet, parseRuleTable, createRuleEngine, RuleBuilder } from 'model-rule-checker';
 *
 * // Load rules from a tab-separated sheet
 * const { groups, messages } = parseRuleTable(parseRuleSheet(tsvText));
 *
 * // Evaluate against flat elements
 * const engine = createRuleEngine(elements);
 * const results = engine.evaluateAll(groups ?? []);
 *
 * // Or build a rule in code
 * const result = engine.evaluate(
 *   RuleBuilder
 *     .rule('1')
 *     .where('category').matches('Walls')
 *     .check('width').greaterThan(200)
 *     .withSeverity('Warning')
 *     .build()
 * );
 * ```
 */

// Core types
export type {
  // Element types
  Element,
  Container,
  PropertyLookup,
  PropertyMatchMode,
  ResolveOptions,

  // Rule types
  Logic,
  Severity,
  Scalar,
  RuleValue,
  Predicate,
  Condition,
  RuleGroup,
  Cell,
  RawTable,
  ParsedRuleTable,

  // Result types
  EvaluationOutcome,
  EvaluationResult,
  RuleEngine,
  ValidationResult,
  ValidationError,
  ValidationWarning,

  // Host types
  ResultLevel,
  ResultStatus,
  ResultMetadata,
  HostContext,
  RuleTableReadResult,
  RuleTableSource,
  ReportOptions,
} from './core/types';
export { LOGIC_KEYWORDS, SEVERITY_ORDER } from './core/types';

// Property resolution
export {
  normalizePath,
  searchPath,
  extractValue,
  findProperty,
  hasParameter,
  getParameterValue,
  detectSchemaVersion,
} from './core/property-resolver';

// Predicates
export {
  PREDICATES,
  DEFAULT_FUZZY_THRESHOLD,
  resolvePredicate,
  normalizePredicateName,
} from './core/predicates';
export type { LikeOptions } from './core/predicates';

// Rule table, evaluation and reporting
export {
  parseRuleTable,
  parseSeverity,
  normalizeColumns,
  validateRuleStructure,
} from './core/rule-table';
export { createRuleEngine, evaluateRuleGroup, splitFiltersAndCheck } from './core/rule-evaluator';
export type { EngineOptions } from './core/rule-evaluator';
export { reportResults, buildMetadata, elementIds } from './core/result-reporter';

// Operators
export {
  convertYesNo,
  parseBooleanValue,
  parseNumberFromString,
  toNumber,
  compareValues,
  similarityRatio,
} from './operators';
export type { CompareOptions } from './operators';

// Fluent builder
export { RuleBuilder } from './builders/fluent-builder';
export type { RuleBuilderType } from './builders/fluent-builder';

// Boundary
export { parseRuleSheet, FileRuleTableSource } from './io/rule-sheet';
export { flattenModel } from './host/flatten';
export { InMemoryHostContext } from './host/memory-context';
export { runAutomation } from './host/automation';
export { parseFunctionInputs, loadFunctionInputs } from './config';
export type { FunctionInputs } from './config';
export { RuleStructureError, RuleTableError, ConfigurationError } from './errors';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
