/**
 * Rule sheet reading
 *
 * Tab-separated rule sheets are parsed with SheetJS into a raw table.
 * Columns whose every filled cell is a plain number are typed as numbers;
 * everything else stays text.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import * as XLSX from 'xlsx';
import type { Cell, RawTable, RuleTableReadResult, RuleTableSource } from '../core/types';
import { RuleTableError, errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';

const NUMBER_CELL = /^-?\d+(\.\d+)?$/;

function toCell(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function isNumericColumn(cells: readonly string[]): boolean {
  const filled = cells.filter(cell => cell.trim() !== '');
  return filled.length > 0 && filled.every(cell => NUMBER_CELL.test(cell.trim()));
}

/**
 * Parse tab-separated text into a raw table (first line is the header)
 *
 * @throws RuleTableError when the text has no header row
 */
export function parseRuleSheet(text: string): RawTable {
  const workbook = XLSX.read(text, { type: 'string', FS: '\t', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (sheet === undefined) {
    throw new RuleTableError('Rule sheet is empty');
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: true,
    blankrows: false,
  });

  const [header, ...body] = matrix;
  if (header === undefined || header.length === 0) {
    throw new RuleTableError('Rule sheet has no header row');
  }

  const columns = header.map(name => toCell(name).trim());
  const cellGrid = body.map(row => columns.map((_, index) => toCell(row[index])));

  const numeric = columns.map((_, index) => isNumericColumn(cellGrid.map(row => row[index])));

  const rows = cellGrid.map(row => {
    const record: Record<string, Cell> = {};
    columns.forEach((column, index) => {
      const cell = row[index];
      if (numeric[index]) {
        record[column] = cell.trim() === '' ? null : Number(cell.trim());
      } else {
        record[column] = cell;
      }
    });
    return record;
  });

  return { columns, rows };
}

/**
 * Reads rule sheets from local paths and `file:` URLs
 */
export class FileRuleTableSource implements RuleTableSource {
  private readonly log: Logger;

  constructor(log: Logger = defaultLogger) {
    this.log = log;
  }

  async read(url: string): Promise<RuleTableReadResult> {
    if (/^https?:\/\//i.test(url)) {
      return {
        table: null,
        messages: [`Failed to read the TSV from the URL: remote rule sheets are not supported (${url})`],
      };
    }

    try {
      const path = url.startsWith('file:') ? fileURLToPath(url) : url;
      const text = await readFile(path, 'utf8');
      const table = parseRuleSheet(text);
      this.log.debug('Rule sheet read', { url, rows: table.rows.length });
      return { table, messages: [] };
    } catch (error) {
      this.log.error('Failed to read rule sheet', { url, error: errorMessage(error) });
      return { table: null, messages: [`Failed to read the TSV from the URL: ${errorMessage(error)}`] };
    }
  }
}
