import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { createValidationPolicy, DEFAULT_VALIDATION_POLICY } from '../services/validation/policy.js';

describe('validation policy', () => {
  it('defaults to quarter-diopter powers within +/-20', () => {
    expect(DEFAULT_VALIDATION_POLICY.sphere).toEqual({ min: -20, max: 20, step: 0.25, tolerance: 0.05 });
    expect(DEFAULT_VALIDATION_POLICY.axis).toEqual({ min: 0, max: 180 });
    expect(DEFAULT_VALIDATION_POLICY.pupillaryDistance).toEqual({ min: 50, max: 75 });
    expect(DEFAULT_VALIDATION_POLICY.addTypical).toEqual({ min: 0.75, max: 3.5 });
  });

  it('is frozen all the way down', () => {
    const policy = createValidationPolicy();
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.sphere)).toBe(true);
    expect(Object.isFrozen(policy.dateFormats)).toBe(true);
  });

  it('layers overrides over the defaults', () => {
    const policy = createValidationPolicy({ cylinder: { tolerance: 0.1 }, pupillaryDistance: { max: 80 } });

    expect(policy.cylinder).toEqual({ min: -20, max: 20, step: 0.25, tolerance: 0.1 });
    expect(policy.sphere.tolerance).toBe(0.05);
    expect(policy.pupillaryDistance).toEqual({ min: 50, max: 80 });
    expect(policy.dateFormats).toEqual(DEFAULT_VALIDATION_POLICY.dateFormats);
  });

  it('rejects inconsistent policies', () => {
    expect(() => createValidationPolicy({ axis: { min: 10, max: 5 } })).toThrow(ZodError);
    expect(() => createValidationPolicy({ sphere: { step: 0 } })).toThrow(ZodError);
    expect(() => createValidationPolicy({ add: { tolerance: -0.01 } })).toThrow(ZodError);
    expect(() => createValidationPolicy({ dateFormats: [] })).toThrow(ZodError);
  });
});
