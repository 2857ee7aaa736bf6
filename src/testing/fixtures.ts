/**
 * Shared test fixtures
 */

import { vi } from 'vitest';
import type { Cell, Condition, RawTable } from '../core/types';
import type { Logger } from '../logger';
import { resolvePredicate, unknownPredicate } from '../core/predicates';

export const SHEET_COLUMNS = [
  'Rule Number',
  'Logic',
  'Property Name',
  'Predicate',
  'Value',
  'Message',
  'Report Severity',
];

export function rawTable(columns: readonly string[], rows: ReadonlyArray<readonly Cell[]>): RawTable {
  return {
    columns,
    rows: rows.map(cells => {
      const record: Record<string, Cell> = {};
      columns.forEach((column, index) => {
        record[column] = cells[index];
      });
      return record;
    }),
  };
}

export function condition(
  logic: string,
  propertyPath = 'category',
  predicateName = 'matches',
  value: Cell = 'Walls',
  ruleId = '1'
): Condition {
  return {
    ruleId,
    row: 0,
    logic,
    propertyPath,
    predicateName,
    value: value ?? null,
    test: resolvePredicate(predicateName) ?? unknownPredicate,
  };
}

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
