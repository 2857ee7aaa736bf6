/**
 * Core types for spreadsheet-driven model validation
 *
 * This module defines the data structures for:
 * - Model elements (schema-ambiguous, tree-shaped records)
 * - Rule definitions (WHERE/AND/CHECK condition groups)
 * - Evaluation results and the host context that receives them
 */

// ============================================================================
// Model Elements
// ============================================================================

/**
 * One model entity. Members are arbitrary and may nest further records,
 * `Map`s or sequences. Two historical layouts exist:
 *
 * - legacy: `parameters[<key or GUID>] = { name, value, units? }`
 * - current: `properties.Parameters.<group>.<subgroup>.<name> = { value }`
 */
export type Element = Readonly<Record<string, unknown>>;

/** A mapping the resolver can walk into */
export type Container = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

export interface PropertyLookup {
  found: boolean;
  value: unknown;
}

export type PropertyMatchMode = 'strict' | 'fuzzy' | 'mixed';

export interface ResolveOptions {
  /** Return the matched leaf as-is: no `.value` unwrapping, no Yes/No coercion */
  raw?: boolean;
  matchMode?: PropertyMatchMode;
}

// ============================================================================
// Rule Definitions
// ============================================================================

export type Logic = 'WHERE' | 'AND' | 'CHECK';

export const LOGIC_KEYWORDS: readonly Logic[] = ['WHERE', 'AND', 'CHECK'];

export type Severity = 'Info' | 'Warning' | 'Error';

export const SEVERITY_ORDER: Record<Severity, number> = {
  Info: 0,
  Warning: 1,
  Error: 2,
};

export type Scalar = string | number | boolean | null;

/** Value column content: a cell, or a literal list for `in list` */
export type RuleValue = Scalar | readonly Scalar[];

/**
 * A named boolean test on one element.
 * Predicates never throw; missing properties map to a fixed result.
 */
export type Predicate = (
  element: Element,
  propertyPath: string,
  value: RuleValue,
  options?: ResolveOptions
) => boolean;

export interface Condition {
  ruleId: string;
  /** Zero-based row index in the source table */
  row: number;
  /** Upper-cased; unknown keywords are kept so validation can reject them */
  logic: Logic | (string & {});
  propertyPath: string;
  predicateName: string;
  value: RuleValue;
  /** Resolved once when the table is loaded */
  test: Predicate;
}

export interface RuleGroup {
  ruleId: string;
  conditions: readonly Condition[];
  message: string;
  severity: Severity;
}

// ============================================================================
// Raw Rule Table
// ============================================================================

export type Cell = string | number | boolean | null | undefined;

export interface RawTable {
  columns: readonly string[];
  rows: ReadonlyArray<Readonly<Record<string, Cell>>>;
}

export interface ParsedRuleTable {
  /** `null` when the table could not be processed at all */
  groups: RuleGroup[] | null;
  messages: string[];
}

// ============================================================================
// Evaluation Results
// ============================================================================

export type EvaluationOutcome = 'evaluated' | 'skipped';

export interface EvaluationResult {
  ruleId: string;
  passed: Element[];
  failed: Element[];
  outcome: EvaluationOutcome;
  /** Structural problem that made the group degenerate */
  error?: string;
}

export interface RuleEngine {
  /** The element sequence being validated */
  readonly elements: readonly Element[];

  /** Run one group's filters and check */
  evaluate(group: RuleGroup): EvaluationResult;

  /** Run every group in order */
  evaluateAll(groups: readonly RuleGroup[]): Map<string, EvaluationResult>;

  /** Check a group's grammar without evaluating it */
  validate(group: RuleGroup): ValidationResult;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  path: string;
  message: string;
  condition?: Condition;
}

export interface ValidationWarning {
  path: string;
  message: string;
  suggestion?: string;
}

// ============================================================================
// Host Context
// ============================================================================

export type ResultLevel = 'INFO' | 'WARNING' | 'ERROR';

export type ResultStatus = 'PASS' | 'FAIL';

export interface ResultMetadata {
  rule_id: string;
  status: ResultStatus;
  severity: Severity;
  message: string;
  object_count: number;
}

/**
 * The automation runtime that supplies the model and collects annotations.
 */
export interface HostContext {
  receiveModel(): Element | Promise<Element>;
  attachInfo(
    category: string,
    elementIds: string[],
    message: string,
    metadata: ResultMetadata | Record<string, never>
  ): void;
  attachResult(
    category: string,
    elementIds: string[],
    message: string,
    level: ResultLevel,
    metadata: ResultMetadata | Record<string, never>
  ): void;
  markRunSuccess(summary: string): void;
  markRunException(reason: string): void;
}

export interface RuleTableReadResult {
  table: RawTable | null;
  messages: string[];
}

export interface RuleTableSource {
  read(url: string): Promise<RuleTableReadResult>;
}

export interface ReportOptions {
  minimumSeverity: Severity;
  hideSkipped: boolean;
}
