import { describe, expect, it } from 'vitest';

import { validateAxis } from '../services/validation/axis.js';
import { DEFAULT_VALIDATION_POLICY } from '../services/validation/policy.js';

const range = DEFAULT_VALIDATION_POLICY.axis;

describe('validateAxis', () => {
  it('accepts whole degrees next to a non-zero cylinder', () => {
    expect(validateAxis(90, -0.75, 'right_eye', range)).toEqual({ value: 90, issues: [] });
    expect(validateAxis('180', -1, 'right_eye', range)).toEqual({ value: 180, issues: [] });
    expect(validateAxis(0, 0.5, 'left_eye', range)).toEqual({ value: 0, issues: [] });
  });

  it('truncates fractional degrees', () => {
    expect(validateAxis('175.9', -1, 'right_eye', range).value).toBe(175);
    expect(validateAxis(-0.5, -1, 'right_eye', range).value).toBe(0);
  });

  it('voids the axis when the cylinder is zero', () => {
    expect(validateAxis(90, 0, 'left_eye', range)).toEqual({
      value: null,
      issues: [
        { kind: 'DEPENDENT_FIELD_INVALID', field: 'left_eye axis', note: 'left_eye axis invalid (cylinder is 0)' },
      ],
    });
  });

  it('voids the axis when the cylinder is missing, before parsing it', () => {
    expect(validateAxis('garbage', null, 'left_eye', range).issues.map((i) => i.note)).toEqual([
      'left_eye axis invalid (cylinder is 0)',
    ]);
  });

  it('rejects axes outside 0-180', () => {
    expect(validateAxis(181, -1, 'right_eye', range)).toEqual({
      value: null,
      issues: [{ kind: 'OUT_OF_RANGE', field: 'right_eye axis', note: 'right_eye axis 181 out of range (0-180)' }],
    });
    expect(validateAxis(-5, -1, 'right_eye', range).issues[0]?.note).toBe('right_eye axis -5 out of range (0-180)');
  });

  it('flags unparseable axes', () => {
    expect(validateAxis('x', -1, 'right_eye', range).issues[0]).toEqual({
      kind: 'UNPARSEABLE_VALUE',
      field: 'right_eye axis',
      note: 'right_eye axis invalid format: x',
    });
  });
});
