import { describe, expect, it } from 'vitest';
import {
  detectSchemaVersion,
  extractValue,
  findProperty,
  getParameterValue,
  hasParameter,
  normalizePath,
  searchPath,
} from './property-resolver';

const legacyWall = {
  id: 'legacy-1',
  category: 'Walls',
  parameters: {
    WALL_ATTR_WIDTH_PARAM: { name: 'Width', value: 300, units: 'mm' },
    'a1b2-guid': { name: 'Fire Rating', value: 'EI60' },
  },
};

const currentWall = {
  id: 'current-1',
  category: 'Walls',
  properties: {
    Parameters: {
      'Instance Parameters': {
        Structural: { Structural: { name: 'Structural', value: 'Yes' } },
      },
      'Type Parameters': {
        Construction: { Width: { name: 'Width', value: 250 } },
      },
    },
  },
};

describe('normalizePath', () => {
  it('drops schema segments and empties', () => {
    expect(normalizePath('properties.Parameters.Type Parameters.Construction.Width')).toEqual([
      'Type Parameters',
      'Construction',
      'Width',
    ]);
    expect(normalizePath('.category.')).toEqual(['category']);
  });
});

describe('searchPath', () => {
  it('matches keys case-insensitively', () => {
    expect(searchPath({ Category: 'Walls' }, ['category'])).toEqual({ found: true, value: 'Walls' });
  });

  it('matches partial keys only in fuzzy modes', () => {
    const record = { 'Fire Rating (min)': 60 };
    expect(searchPath(record, ['fire rating']).found).toBe(false);
    expect(searchPath(record, ['fire rating'], 'fuzzy')).toEqual({ found: true, value: 60 });
    expect(searchPath(record, ['fire rating'], 'mixed')).toEqual({ found: true, value: 60 });
  });

  it('reads Map containers', () => {
    const record = new Map<string, unknown>([['Width', 12]]);
    expect(searchPath(record, ['width'])).toEqual({ found: true, value: 12 });
  });
});

describe('extractValue', () => {
  it('unwraps parameter records and converts Yes/No', () => {
    expect(extractValue({ name: 'Structural', value: 'Yes' })).toBe(true);
    expect(extractValue('no')).toBe(false);
  });

  it('returns other containers unchanged', () => {
    const group = { Width: 1 };
    expect(extractValue(group)).toBe(group);
  });

  it('returns the leaf untouched when raw', () => {
    const leaf = { value: 'Yes' };
    expect(extractValue(leaf, true)).toBe(leaf);
  });
});

describe('findProperty on the legacy layout', () => {
  it.each([
    'Width',
    'WALL_ATTR_WIDTH_PARAM',
    'parameters.WALL_ATTR_WIDTH_PARAM',
    'WALL_ATTR_WIDTH_PARAM.value',
  ])('resolves %s', path => {
    expect(findProperty(legacyWall, path)).toEqual({ found: true, value: 300 });
  });

  it('finds a GUID-keyed parameter by display name', () => {
    expect(findProperty(legacyWall, 'fire rating')).toEqual({ found: true, value: 'EI60' });
  });
});

describe('findProperty on the current layout', () => {
  it('ignores the properties.Parameters prefix', () => {
    const full = findProperty(currentWall, 'properties.Parameters.Instance Parameters.Structural.Structural');
    const short = findProperty(currentWall, 'Instance Parameters.Structural.Structural');
    expect(full).toEqual({ found: true, value: true });
    expect(short).toEqual(full);
  });

  it('finds nested parameters by their last segment', () => {
    expect(findProperty(currentWall, 'Width')).toEqual({ found: true, value: 250 });
  });

  it('reports missing properties', () => {
    expect(findProperty(currentWall, 'Fire Rating')).toEqual({ found: false, value: undefined });
    expect(findProperty(currentWall, '')).toEqual({ found: false, value: undefined });
  });
});

describe('findProperty traversal', () => {
  it('prefers children before later siblings', () => {
    const element = {
      first: { nested: { mark: 'deep' } },
      second: { mark: 'shallow' },
    };
    expect(findProperty(element, 'mark')).toEqual({ found: true, value: 'deep' });
  });

  it('skips private members', () => {
    expect(findProperty({ _cache: { mark: 1 } }, 'mark').found).toBe(false);
  });

  it('terminates on cycles', () => {
    const element: Record<string, unknown> = { id: 'cyclic' };
    element['self'] = element;
    expect(findProperty(element, 'missing').found).toBe(false);
  });
});

describe('hasParameter and getParameterValue', () => {
  it('report presence regardless of value', () => {
    expect(hasParameter({ note: null }, 'note')).toBe(true);
    expect(hasParameter({ note: null }, 'other')).toBe(false);
  });

  it('fall back to the default', () => {
    expect(getParameterValue(legacyWall, 'Height', 0)).toBe(0);
    expect(getParameterValue(legacyWall, 'Width')).toBe(300);
  });
});

describe('detectSchemaVersion', () => {
  it('reads the root version or defaults to 2', () => {
    expect(detectSchemaVersion({ version: 3 })).toBe(3);
    expect(detectSchemaVersion({ version: '3' })).toBe(3);
    expect(detectSchemaVersion({})).toBe(2);
  });
});
