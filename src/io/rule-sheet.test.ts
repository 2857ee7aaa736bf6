import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { FileRuleTableSource, parseRuleSheet } from './rule-sheet';
import { silentLogger } from '../testing/fixtures';

const sheet = [
  'Rule Number\tLogic\tProperty Name\tPredicate\tValue\tMessage\tReport Severity',
  '1\tWHERE\tcategory\tmatches\tWalls\tWall width ok\tWarning',
  '1\tCHECK\twidth\tgreater than\t200\t\t',
].join('\n');

describe('parseRuleSheet', () => {
  it('reads the header and rows', () => {
    const table = parseRuleSheet(sheet);

    expect(table.columns).toEqual([
      'Rule Number',
      'Logic',
      'Property Name',
      'Predicate',
      'Value',
      'Message',
      'Report Severity',
    ]);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[1]).toMatchObject({
      Logic: 'CHECK',
      'Property Name': 'width',
      Predicate: 'greater than',
      Message: '',
      'Report Severity': '',
    });
  });

  it('types fully numeric columns as numbers', () => {
    const table = parseRuleSheet(sheet);

    expect(table.rows.map(row => row['Rule Number'])).toEqual([1, 1]);
    expect(table.rows.map(row => row['Value'])).toEqual(['Walls', '200']);
  });

  it('splits on tabs even when values hold many commas', () => {
    const tokens = Array.from({ length: 20 }, (_, i) => `T${i}`).join(',');
    const table = parseRuleSheet([
      'Rule Number\tLogic\tProperty Name\tPredicate\tValue\tMessage\tReport Severity',
      '1\tWHERE\tcategory\tmatches\tWalls\tType marks, all of them, must be listed\tError',
      `1\tCHECK\tType Mark\tin list\t${tokens}\t\t`,
    ].join('\n'));

    expect(table.columns).toHaveLength(7);
    expect(table.columns).toContain('Logic');
    expect(table.rows[0]['Message']).toBe('Type marks, all of them, must be listed');
    expect(table.rows[1]['Value']).toBe(tokens);
  });
});

describe('FileRuleTableSource', () => {
  let dir: string;
  let path: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rule-sheet-'));
    path = join(dir, 'rules.tsv');
    await writeFile(path, sheet, 'utf8');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads local paths and file URLs', async () => {
    const source = new FileRuleTableSource(silentLogger());

    const byPath = await source.read(path);
    const byUrl = await source.read(pathToFileURL(path).href);

    expect(byPath.messages).toEqual([]);
    expect(byPath.table?.rows).toHaveLength(2);
    expect(byUrl.table).toEqual(byPath.table);
  });

  it('returns a diagnostic for unreadable files', async () => {
    const result = await new FileRuleTableSource(silentLogger()).read(join(dir, 'missing.tsv'));

    expect(result.table).toBeNull();
    expect(result.messages).toHaveLength(1);
    expect(result.messages[0]).toMatch(/^Failed to read the TSV from the URL: /);
  });

  it('does not fetch remote sheets', async () => {
    const result = await new FileRuleTableSource(silentLogger()).read('https://example.com/rules.tsv');

    expect(result).toEqual({
      table: null,
      messages: [
        'Failed to read the TSV from the URL: remote rule sheets are not supported (https://example.com/rules.tsv)',
      ],
    });
  });
});
