import { describe, it, expect } from 'vitest';
import { validateChangeEvent } from './change-events.js';
import { isRetrySafe, changeKey, CHANGE_TYPES } from '../types/changes.js';

const URN = 'urn:li:dataset:(urn:li:dataPlatform:hive,db.orders,PROD)';

describe('validateChangeEvent', () => {
  it('accepts an UPSERT with a payload', () => {
    const result = validateChangeEvent({
      entityUrn: URN,
      aspectName: 'status',
      changeType: 'UPSERT',
      payload: { removed: false },
    });

    expect(result).toEqual({
      valid: true,
      event: {
        entityUrn: URN,
        aspectName: 'status',
        changeType: 'UPSERT',
        payload: { removed: false },
      },
    });
  });

  it('accepts a DELETE without payload and a PATCH with a diff', () => {
    expect(validateChangeEvent({ entityUrn: URN, aspectName: 'status', changeType: 'DELETE' }).valid).toBe(
      true
    );
    expect(
      validateChangeEvent({
        entityUrn: URN,
        aspectName: 'datasetProperties',
        changeType: 'PATCH',
        patch: { description: 'Orders' },
      }).valid
    ).toBe(true);
  });

  it('accepts the reserved UPDATE tag on the wire', () => {
    const result = validateChangeEvent({
      entityUrn: URN,
      aspectName: 'status',
      changeType: 'UPDATE',
      payload: { removed: true },
    });

    expect(result.valid).toBe(true);
  });

  it('rejects an unknown change type', () => {
    const result = validateChangeEvent({
      entityUrn: URN,
      aspectName: 'status',
      changeType: 'MERGE',
      payload: {},
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues[0].path).toBe('changeType');
    }
  });

  it('rejects entity identifiers that are not URNs', () => {
    const result = validateChangeEvent({
      entityUrn: 'orders',
      aspectName: 'status',
      changeType: 'UPSERT',
      payload: {},
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues).toEqual([
        { path: 'entityUrn', message: 'must be a URN (urn:<namespace>:<type>:<key>)' },
      ]);
    }
  });

  it('rejects a payload on DELETE and a missing payload on CREATE', () => {
    expect(
      validateChangeEvent({ entityUrn: URN, aspectName: 'status', changeType: 'DELETE', payload: {} }).valid
    ).toBe(false);

    const missing = validateChangeEvent({ entityUrn: URN, aspectName: 'status', changeType: 'CREATE' });
    expect(missing.valid).toBe(false);
    if (!missing.valid) {
      expect(missing.issues[0].path).toBe('payload');
    }
  });

  it('rejects a PATCH without a diff', () => {
    const result = validateChangeEvent({
      entityUrn: URN,
      aspectName: 'status',
      changeType: 'PATCH',
      payload: { removed: true },
    });

    expect(result.valid).toBe(false);
  });

  it('rejects non-objects', () => {
    expect(validateChangeEvent('UPSERT').valid).toBe(false);
    expect(validateChangeEvent(null).valid).toBe(false);
  });
});

describe('change type helpers', () => {
  it('marks only UPSERT and DELETE as retry-safe', () => {
    const safe = CHANGE_TYPES.filter((t) => isRetrySafe(t));
    expect(safe).toEqual(['UPSERT', 'DELETE']);
  });

  it('derives distinct keys per entity and aspect', () => {
    expect(changeKey({ entityUrn: URN, aspectName: 'status' })).not.toBe(
      changeKey({ entityUrn: URN, aspectName: 'datasetProperties' })
    );
    expect(changeKey({ entityUrn: URN, aspectName: 'status' })).toBe(
      changeKey({ entityUrn: URN, aspectName: 'status' })
    );
  });
});
