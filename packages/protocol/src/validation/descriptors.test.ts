import { describe, it, expect } from 'vitest';
import { validateAspectDescriptor, isValidAspectName } from './descriptors.js';
import type { AspectDescriptor, FieldDescriptor } from '../types/aspects.js';

function field(overrides: Partial<FieldDescriptor> & Pick<FieldDescriptor, 'name'>): FieldDescriptor {
  return {
    type: { kind: 'primitive', name: 'string' },
    optional: true,
    search: null,
    timeseries: null,
    ...overrides,
  };
}

function usageDescriptor(fields: FieldDescriptor[]): AspectDescriptor {
  return {
    name: 'usage',
    kind: 'timeseries',
    description: 'Usage buckets',
    fields: [
      field({ name: 'timestampMillis', type: { kind: 'primitive', name: 'long' }, optional: false }),
      ...fields,
    ],
  };
}

describe('isValidAspectName', () => {
  it('accepts identifiers', () => {
    expect(isValidAspectName('schemaFieldAliases')).toBe(true);
    expect(isValidAspectName('dataset_usage')).toBe(true);
  });

  it('rejects dashes and leading digits', () => {
    expect(isValidAspectName('dataset-usage')).toBe(false);
    expect(isValidAspectName('1usage')).toBe(false);
  });
});

describe('validateAspectDescriptor', () => {
  it('accepts a well-formed versioned descriptor', () => {
    const result = validateAspectDescriptor({
      name: 'schemaFieldAliases',
      kind: 'versioned',
      description: 'Aliases',
      fields: [
        field({
          name: 'aliases',
          type: { kind: 'array', items: { kind: 'urn' } },
          search: { fieldName: 'schemaFieldAliases', fieldType: 'URN', queryByDefault: false, path: '/*' },
        }),
      ],
    });

    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  it('warns when the description is missing', () => {
    const result = validateAspectDescriptor({
      name: 'status',
      kind: 'versioned',
      fields: [field({ name: 'removed', type: { kind: 'primitive', name: 'boolean' } })],
    });

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['MISSING_DESCRIPTION']);
  });

  it('rejects duplicate field names', () => {
    const result = validateAspectDescriptor({
      name: 'status',
      kind: 'versioned',
      description: 'Status',
      fields: [field({ name: 'removed' }), field({ name: 'removed' })],
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'aspect.fields[1].name', message: 'Duplicate field: removed', code: 'DUPLICATE_FIELD' },
    ]);
  });

  it('rejects a wildcard search hint on a scalar field', () => {
    const result = validateAspectDescriptor({
      name: 'ownership',
      kind: 'versioned',
      description: 'Owner',
      fields: [
        field({
          name: 'owner',
          type: { kind: 'urn' },
          search: { fieldType: 'URN', queryByDefault: false, path: '/*' },
        }),
      ],
    });

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('INVALID_HINT');
    expect(result.errors[0].path).toBe('aspect.fields[0].search.path');
  });

  it('rejects time-series hints on versioned aspects', () => {
    const result = validateAspectDescriptor({
      name: 'status',
      kind: 'versioned',
      description: 'Status',
      fields: [field({ name: 'removed', timeseries: { isField: true, isCollection: false } })],
    });

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('INVALID_HINT');
  });

  it('requires a required long timestampMillis on time-series aspects', () => {
    const missing = validateAspectDescriptor({
      name: 'usage',
      kind: 'timeseries',
      description: 'Usage',
      fields: [field({ name: 'count', type: { kind: 'primitive', name: 'int' } })],
    });
    expect(missing.errors.map((e) => e.code)).toEqual(['MISSING_FIELD']);

    const optional = validateAspectDescriptor({
      name: 'usage',
      kind: 'timeseries',
      description: 'Usage',
      fields: [field({ name: 'timestampMillis', type: { kind: 'primitive', name: 'long' }, optional: true })],
    });
    expect(optional.errors.map((e) => e.code)).toEqual(['INVALID_TYPE']);
  });

  it('requires collections to be arrays with a key', () => {
    const result = validateAspectDescriptor(
      usageDescriptor([
        field({ name: 'userCounts', timeseries: { isField: false, isCollection: true } }),
      ])
    );

    expect(result.errors.map((e) => e.code)).toEqual(['INVALID_HINT', 'MISSING_FIELD']);
  });

  it('accepts time-series fields and keyed collections', () => {
    const result = validateAspectDescriptor(
      usageDescriptor([
        field({
          name: 'uniqueUserCount',
          type: { kind: 'primitive', name: 'int' },
          timeseries: { isField: true, isCollection: false },
        }),
        field({
          name: 'userCounts',
          type: { kind: 'array', items: { kind: 'primitive', name: 'record' } },
          timeseries: { isField: false, isCollection: true, collectionKey: 'user' },
        }),
      ])
    );

    expect(result.valid).toBe(true);
  });
});
