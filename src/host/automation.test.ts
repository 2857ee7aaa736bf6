import { describe, expect, it } from 'vitest';
import { runAutomation } from './automation';
import { InMemoryHostContext } from './memory-context';
import type { RawTable, RuleTableReadResult, RuleTableSource } from '../core/types';
import type { FunctionInputs } from '../config';
import { SHEET_COLUMNS, rawTable, silentLogger } from '../testing/fixtures';

class StaticRuleTableSource implements RuleTableSource {
  readonly requested: string[] = [];

  constructor(private readonly result: RuleTableReadResult) {}

  async read(url: string): Promise<RuleTableReadResult> {
    this.requested.push(url);
    return this.result;
  }
}

const inputs: FunctionInputs = {
  spreadsheetUrl: 'file:///rules.tsv',
  minimumSeverity: 'Info',
  hideSkipped: false,
  propertyMatchMode: 'strict',
  logLevel: 'error',
};

const wallA = { id: 'A', category: 'Walls', width: 300 };
const wallB = { id: 'B', category: 'Walls', width: 100 };
const doorC = { id: 'C', category: 'Doors', width: 500 };
const model = { id: 'root', version: 3, elements: [wallA, wallB, doorC] };

const wallWidthRules: RawTable = rawTable(SHEET_COLUMNS, [
  [1, 'WHERE', 'category', 'matches', 'Walls', 'Wall width ok', 'Warning'],
  [1, 'CHECK', 'width', 'greater than', '200', '', ''],
]);

describe('runAutomation', () => {
  it('checks wall widths end to end', async () => {
    const context = new InMemoryHostContext(model);
    const source = new StaticRuleTableSource({ table: wallWidthRules, messages: [] });

    const summary = await runAutomation(context, inputs, { source, logger: silentLogger() });

    expect(source.requested).toEqual(['file:///rules.tsv']);
    expect(summary?.results.get('1')).toMatchObject({ passed: [wallA], failed: [wallB], outcome: 'evaluated' });
    expect(context.annotations.map(a => [a.kind, a.level, a.elementIds])).toEqual([
      ['info', 'INFO', ['A']],
      ['result', 'WARNING', ['B']],
    ]);
    expect(context.status).toBe('succeeded');
    expect(context.statusMessage).toBe('Successfully applied 1 rules to 4 version 3 objects.');
  });

  it('reports only failures above Info', async () => {
    const context = new InMemoryHostContext(model);
    const source = new StaticRuleTableSource({ table: wallWidthRules, messages: [] });

    await runAutomation(context, { ...inputs, minimumSeverity: 'Warning' }, { source, logger: silentLogger() });

    expect(context.annotations.map(a => a.elementIds)).toEqual([['B']]);
  });

  it('marks an exception when the sheet cannot be read', async () => {
    const logger = silentLogger();
    const context = new InMemoryHostContext(model);
    const source = new StaticRuleTableSource({
      table: null,
      messages: ['Failed to read the TSV from the URL: not found'],
    });

    const summary = await runAutomation(context, inputs, { source, logger });

    expect(summary).toBeNull();
    expect(context.status).toBe('exception');
    expect(context.statusMessage).toBe('Failed to process rules');
    expect(context.annotations).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith('Failed to read the TSV from the URL: not found');
  });

  it('marks an exception when the sheet cannot be parsed', async () => {
    const context = new InMemoryHostContext(model);
    const source = new StaticRuleTableSource({
      table: rawTable(['Logic'], [['WHERE']]),
      messages: [],
    });

    await runAutomation(context, inputs, { source, logger: silentLogger() });

    expect(context.status).toBe('exception');
    expect(context.statusMessage).toBe('Failed to process rules');
  });

  it('defaults the schema version to 2', async () => {
    const context = new InMemoryHostContext({ id: 'root', elements: [wallA] });
    const source = new StaticRuleTableSource({ table: wallWidthRules, messages: [] });

    await runAutomation(context, inputs, { source, logger: silentLogger() });

    expect(context.statusMessage).toBe('Successfully applied 1 rules to 2 version 2 objects.');
  });
});
