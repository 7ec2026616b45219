import { describe, it, expect } from 'vitest';

import { isRecord, toJsonObject } from './json';

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('toJsonObject', () => {
  it('drops values JSON cannot carry', () => {
    expect(
      toJsonObject({
        count: 3,
        ratio: Number.NaN,
        label: 'roads',
        missing: undefined,
        handler: () => 1,
        nested: { points: [1, Infinity, { lat: 2 }] },
      })
    ).toEqual({ count: 3, label: 'roads', nested: { points: [1, { lat: 2 }] } });
  });

  it('returns an empty object for non-objects', () => {
    expect(toJsonObject(['a'])).toEqual({});
    expect(toJsonObject(null)).toEqual({});
  });
});
