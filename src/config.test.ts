import { describe, expect, it } from 'vitest';
import { loadFunctionInputs, parseFunctionInputs } from './config';
import { ConfigurationError } from './errors';

describe('parseFunctionInputs', () => {
  it('applies defaults', () => {
    expect(parseFunctionInputs({ spreadsheetUrl: 'file:///rules.tsv' })).toEqual({
      spreadsheetUrl: 'file:///rules.tsv',
      minimumSeverity: 'Info',
      hideSkipped: false,
      propertyMatchMode: 'strict',
      logLevel: 'info',
    });
  });

  it('normalizes case', () => {
    const inputs = parseFunctionInputs({
      spreadsheetUrl: 'rules.tsv',
      minimumSeverity: 'warning',
      propertyMatchMode: 'MIXED',
    });
    expect(inputs.minimumSeverity).toBe('Warning');
    expect(inputs.propertyMatchMode).toBe('mixed');
  });

  it('lists every invalid field', () => {
    try {
      parseFunctionInputs({ minimumSeverity: 'Fatal' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues.map(issue => issue.split(':')[0])).toEqual(['spreadsheetUrl', 'minimumSeverity']);
    }
  });
});

describe('loadFunctionInputs', () => {
  it('reads environment variables', () => {
    const inputs = loadFunctionInputs({}, {
      RULES_SPREADSHEET_URL: 'rules.tsv',
      MINIMUM_SEVERITY: 'Error',
      HIDE_SKIPPED: 'true',
      PROPERTY_MATCH_MODE: 'fuzzy',
      LOG_LEVEL: 'debug',
    });

    expect(inputs).toEqual({
      spreadsheetUrl: 'rules.tsv',
      minimumSeverity: 'Error',
      hideSkipped: true,
      propertyMatchMode: 'fuzzy',
      logLevel: 'debug',
    });
  });

  it('lets explicit values win', () => {
    const inputs = loadFunctionInputs(
      { spreadsheetUrl: 'other.tsv', hideSkipped: false },
      { RULES_SPREADSHEET_URL: 'rules.tsv', HIDE_SKIPPED: '1' }
    );

    expect(inputs.spreadsheetUrl).toBe('other.tsv');
    expect(inputs.hideSkipped).toBe(false);
  });
});
