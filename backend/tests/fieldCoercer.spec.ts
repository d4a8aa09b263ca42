import { describe, expect, it } from 'vitest';

import { coerceNumber, describeRaw, isAbsent } from '../services/validation/fieldCoercer.js';

describe('coerceNumber', () => {
  it('passes finite numbers through', () => {
    expect(coerceNumber(-2.25)).toEqual({ ok: true, value: -2.25 });
    expect(coerceNumber(0)).toEqual({ ok: true, value: 0 });
  });

  it('parses signed decimal strings with surrounding whitespace', () => {
    expect(coerceNumber(' +2.00 ')).toEqual({ ok: true, value: 2 });
    expect(coerceNumber('-0.75')).toEqual({ ok: true, value: -0.75 });
    expect(coerceNumber('.5')).toEqual({ ok: true, value: 0.5 });
    expect(coerceNumber('1e1')).toEqual({ ok: true, value: 10 });
  });

  it('reads the typographic minus sign as a hyphen', () => {
    expect(coerceNumber('−1.50')).toEqual({ ok: true, value: -1.5 });
  });

  it.each([
    ['empty string', ''],
    ['plain text', 'abc'],
    ['two decimal points', '1.2.3'],
    ['comma decimal', '2,50'],
    ['null', null],
    ['undefined', undefined],
    ['boolean', true],
    ['object', { value: 1 }],
    ['NaN', Number.NaN],
    ['Infinity', Number.POSITIVE_INFINITY],
    ['Infinity text', 'Infinity'],
  ])('rejects %s without throwing', (_label, raw) => {
    expect(coerceNumber(raw)).toEqual({ ok: false, value: null });
  });
});

describe('isAbsent', () => {
  it('treats only null and undefined as absent', () => {
    expect(isAbsent(null)).toBe(true);
    expect(isAbsent(undefined)).toBe(true);
    expect(isAbsent('')).toBe(false);
    expect(isAbsent(0)).toBe(false);
  });
});

describe('describeRaw', () => {
  it('renders raw candidates for notes', () => {
    expect(describeRaw('x')).toBe('x');
    expect(describeRaw(3)).toBe('3');
    expect(describeRaw(null)).toBe('null');
    expect(describeRaw(undefined)).toBe('undefined');
    expect(describeRaw({ a: 1 })).toBe('{"a":1}');
  });
});
