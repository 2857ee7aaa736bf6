/**
 * Rule Table - turns a raw tabular rule sheet into typed rule groups
 *
 * Sheet layout: one condition per row, columns
 *   Rule Number | Logic | Property Name | Predicate | Value | Message | Report Severity
 *
 * A WHERE row opens a rule group; following AND rows narrow it and an
 * optional final CHECK row decides pass/fail. Parsing fails softly: the
 * caller always gets a result plus diagnostic messages.
 */

import type {
  Cell,
  Condition,
  Logic,
  ParsedRuleTable,
  RawTable,
  RuleGroup,
  Scalar,
  Severity,
} from './types';
import { LOGIC_KEYWORDS } from './types';
import { resolvePredicate, unknownPredicate } from './predicates';
import { RuleStructureError, RuleTableError, errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';

export const COLUMNS = {
  ruleNumber: ['Rule Number'],
  logic: ['Logic'],
  property: ['Property Name', 'Property Path'],
  predicate: ['Predicate'],
  value: ['Value'],
  message: ['Message'],
  severity: ['Report Severity', 'Severity'],
} as const;

type ColumnKey = keyof typeof COLUMNS;

const COLUMN_KEYS: readonly ColumnKey[] = [
  'ruleNumber',
  'logic',
  'property',
  'predicate',
  'value',
  'message',
  'severity',
];

const NUMERIC_CELL = /^(\d+\.?\d*|\.\d+)$/;

const SEVERITY_ALIASES: Record<string, Severity> = {
  INFO: 'Info',
  WARNING: 'Warning',
  WARN: 'Warning',
  ERROR: 'Error',
};

export interface ParseOptions {
  logger?: Logger;
}

function isMissingCell(cell: Cell): boolean {
  return (
    cell === null ||
    cell === undefined ||
    (typeof cell === 'number' && Number.isNaN(cell)) ||
    (typeof cell === 'string' && cell.trim() === '')
  );
}

function looksNumeric(cell: Cell): boolean {
  if (typeof cell === 'number') return Number.isFinite(cell);
  return NUMERIC_CELL.test(String(cell));
}

function toScalar(cell: Cell): Scalar {
  return cell === undefined || (typeof cell === 'number' && Number.isNaN(cell)) ? null : cell;
}

/**
 * Settle each column's typing: a column with any numeric-looking value keeps
 * its cells (missing → null), every other column becomes strings (missing → "").
 */
export function normalizeColumns(table: RawTable): RawTable {
  const numericColumns = new Set(
    table.columns.filter(column =>
      table.rows.some(row => {
        const cell = row[column];
        return !isMissingCell(cell) && looksNumeric(cell);
      })
    )
  );

  const rows = table.rows.map(row => {
    const normalized: Record<string, Cell> = {};
    for (const column of table.columns) {
      const cell = row[column];
      if (numericColumns.has(column)) {
        normalized[column] = isMissingCell(cell) ? null : cell;
      } else {
        normalized[column] = isMissingCell(cell) ? '' : String(cell);
      }
    }
    return normalized;
  });

  return { columns: table.columns, rows };
}

/**
 * Map a sheet severity to a level. Unknown, blank and non-string values are errors.
 */
export function parseSeverity(value: unknown): Severity {
  if (typeof value !== 'string') return 'Error';
  return SEVERITY_ALIASES[value.trim().toUpperCase()] ?? 'Error';
}

function resolveColumns(table: RawTable): Partial<Record<ColumnKey, string>> {
  const byLowerName = new Map(table.columns.map(column => [column.trim().toLowerCase(), column]));
  const resolved: Partial<Record<ColumnKey, string>> = {};

  for (const key of COLUMN_KEYS) {
    for (const candidate of COLUMNS[key]) {
      const column = byLowerName.get(candidate.toLowerCase());
      if (column !== undefined) {
        resolved[key] = column;
        break;
      }
    }
  }

  return resolved;
}

function readLogic(cell: Cell): string {
  return isMissingCell(cell) ? '' : String(cell).trim().toUpperCase();
}

interface Segment {
  ruleId: string;
  autoNumbered: boolean;
  rows: number[];
}

/**
 * Split rows into WHERE-led segments and give each one a rule number.
 * Rule numbers are kept verbatim; missing ones get the next unused integer.
 */
export function assignRuleNumbers(
  table: RawTable,
  columns: { logic: string; ruleNumber?: string }
): Segment[] {
  const segments: Array<{ rows: number[]; number: Cell }> = [];

  table.rows.forEach((row, index) => {
    const current = segments[segments.length - 1];
    if (current === undefined || readLogic(row[columns.logic]) === 'WHERE') {
      segments.push({
        rows: [index],
        number: columns.ruleNumber !== undefined ? row[columns.ruleNumber] : null,
      });
    } else {
      current.rows.push(index);
    }
  });

  const used = new Set(
    segments.filter(segment => !isMissingCell(segment.number)).map(segment => String(segment.number))
  );
  let nextAutoNumber = 1;

  return segments.map(segment => {
    if (!isMissingCell(segment.number)) {
      return { ruleId: String(segment.number), autoNumbered: false, rows: segment.rows };
    }

    while (used.has(String(nextAutoNumber))) {
      nextAutoNumber++;
    }
    const ruleId = String(nextAutoNumber);
    used.add(ruleId);
    nextAutoNumber++;

    return { ruleId, autoNumbered: true, rows: segment.rows };
  });
}

/**
 * Non-fatal problems with rule numbering
 */
export function validateRuleNumbers(segments: readonly Segment[]): string[] {
  const messages: string[] = [];

  if (segments.some(segment => segment.autoNumbered)) {
    messages.push('Warning: Some rules are missing rule numbers');
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const segment of segments) {
    if (segment.autoNumbered) continue;
    if (seen.has(segment.ruleId) && !duplicates.includes(segment.ruleId)) {
      duplicates.push(segment.ruleId);
    }
    seen.add(segment.ruleId);
  }
  if (duplicates.length > 0) {
    messages.push(`Warning: Duplicate rule numbers found: ${duplicates.join(', ')}`);
  }

  return messages;
}

function lastFilled(cells: Cell[]): Cell {
  for (let i = cells.length - 1; i >= 0; i--) {
    if (!isMissingCell(cells[i])) return cells[i];
  }
  return null;
}

/**
 * Parse a raw rule table into rule groups.
 * Never throws: table-level failures return `groups: null` with a diagnostic.
 */
export function parseRuleTable(raw: RawTable, options: ParseOptions = {}): ParsedRuleTable {
  const log = options.logger ?? defaultLogger;

  try {
    const table = normalizeColumns(raw);
    const columns = resolveColumns(table);

    const { logic, property, predicate } = columns;
    if (logic === undefined || property === undefined || predicate === undefined) {
      const missing = [
        logic === undefined ? 'Logic' : undefined,
        property === undefined ? 'Property Name' : undefined,
        predicate === undefined ? 'Predicate' : undefined,
      ].filter((name): name is string => name !== undefined);
      throw new RuleTableError(`Missing required columns: ${missing.join(', ')}`);
    }

    const segments = assignRuleNumbers(table, { logic, ruleNumber: columns.ruleNumber });
    const messages = validateRuleNumbers(segments);

    const grouped = new Map<string, number[]>();
    for (const segment of segments) {
      const rows = grouped.get(segment.ruleId) ?? [];
      rows.push(...segment.rows);
      grouped.set(segment.ruleId, rows);
    }

    const groups: RuleGroup[] = [];

    for (const [ruleId, rowIndexes] of grouped) {
      const rows = rowIndexes.map(index => table.rows[index]);

      const conditions: Condition[] = rows.map((row, position) => {
        const predicateName = String(row[predicate] ?? '').trim();
        const test = resolvePredicate(predicateName);
        if (test === undefined) {
          messages.push(`Warning: Unknown predicate "${predicateName}" in rule ${ruleId}`);
        }

        return {
          ruleId,
          row: rowIndexes[position],
          logic: readLogic(row[logic]),
          propertyPath: String(row[property] ?? '').trim(),
          predicateName,
          value: columns.value !== undefined ? toScalar(row[columns.value]) : null,
          test: test ?? unknownPredicate,
        };
      });

      const { message: messageColumn, severity: severityColumn } = columns;
      const messageCell = messageColumn !== undefined
        ? lastFilled(rows.map(row => row[messageColumn]))
        : null;
      const severityCell = severityColumn !== undefined
        ? lastFilled(rows.map(row => row[severityColumn]))
        : null;

      groups.push({
        ruleId,
        conditions,
        message: isMissingCell(messageCell) ? 'No Message' : String(messageCell),
        severity: parseSeverity(severityCell),
      });
    }

    log.debug('Rule table parsed', { groups: groups.length, rows: table.rows.length });

    return { groups, messages };
  } catch (error) {
    log.error('Failed to process the rule table', { error: errorMessage(error) });
    return { groups: null, messages: [`Failed to process the rule table: ${errorMessage(error)}`] };
  }
}

function isLogic(value: string): value is Logic {
  return LOGIC_KEYWORDS.some(keyword => keyword === value);
}

/**
 * Check a group's WHERE/AND/CHECK grammar
 *
 * @throws RuleStructureError when the group is malformed
 */
export function validateRuleStructure(group: RuleGroup): void {
  const { conditions, ruleId } = group;
  if (conditions.length === 0) return;

  if (conditions[0].logic !== 'WHERE') {
    throw new RuleStructureError(ruleId, `Rule ${ruleId} must start with WHERE`, conditions[0]);
  }

  const checks = conditions.filter(condition => condition.logic === 'CHECK');
  if (checks.length > 1) {
    throw new RuleStructureError(ruleId, `Rule ${ruleId} has multiple CHECK conditions`, checks[1]);
  }

  if (checks.length === 1 && conditions[conditions.length - 1] !== checks[0]) {
    throw new RuleStructureError(ruleId, `CHECK must be the last condition in rule ${ruleId}`, checks[0]);
  }

  const invalid = conditions.filter(condition => !isLogic(condition.logic));
  if (invalid.length > 0) {
    const values = Array.from(new Set(invalid.map(condition => condition.logic || '(empty)')));
    throw new RuleStructureError(ruleId, `Invalid Logic values found: ${values.join(', ')}`, invalid[0]);
  }
}
