import { z } from 'zod';

export interface QuantizationPolicy {
  min: number;
  max: number;
  step: number;
  tolerance: number;
}

export interface NumericRange {
  min: number;
  max: number;
}

export interface ValidationPolicy {
  sphere: QuantizationPolicy;
  cylinder: QuantizationPolicy;
  add: QuantizationPolicy;
  /** Add powers outside this band are kept but flagged. */
  addTypical: NumericRange;
  axis: NumericRange;
  pupillaryDistance: NumericRange;
  /** luxon format tokens, tried in order; the first full match wins. */
  dateFormats: readonly string[];
}

const POWER_DEFAULTS: QuantizationPolicy = { min: -20, max: 20, step: 0.25, tolerance: 0.05 };

// Month-first before day-first for each separator; 4-digit years before 2-digit ones.
export const DEFAULT_DATE_FORMATS: readonly string[] = Object.freeze([
  'M/d/yyyy',
  'M-d-yyyy',
  'd/M/yyyy',
  'd-M-yyyy',
  'yyyy/M/d',
  'yyyy-M-d',
  'M/d/yy',
  'M-d-yy',
  'd/M/yy',
  'd-M-yy',
]);

function freezePolicy(policy: ValidationPolicy): ValidationPolicy {
  return Object.freeze({
    sphere: Object.freeze({ ...policy.sphere }),
    cylinder: Object.freeze({ ...policy.cylinder }),
    add: Object.freeze({ ...policy.add }),
    addTypical: Object.freeze({ ...policy.addTypical }),
    axis: Object.freeze({ ...policy.axis }),
    pupillaryDistance: Object.freeze({ ...policy.pupillaryDistance }),
    dateFormats: Object.freeze([...policy.dateFormats]),
  });
}

export const DEFAULT_VALIDATION_POLICY: ValidationPolicy = freezePolicy({
  sphere: POWER_DEFAULTS,
  cylinder: POWER_DEFAULTS,
  add: POWER_DEFAULTS,
  addTypical: { min: 0.75, max: 3.5 },
  axis: { min: 0, max: 180 },
  pupillaryDistance: { min: 50, max: 75 },
  dateFormats: DEFAULT_DATE_FORMATS,
});

const rangeSchema = z
  .object({ min: z.number().finite(), max: z.number().finite() })
  .refine((r) => r.min < r.max, { message: 'min must be below max' });

const quantizationSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
    step: z.number().finite().positive(),
    tolerance: z.number().finite().nonnegative(),
  })
  .refine((q) => q.min < q.max, { message: 'min must be below max' });

const policySchema = z.object({
  sphere: quantizationSchema,
  cylinder: quantizationSchema,
  add: quantizationSchema,
  addTypical: rangeSchema,
  axis: rangeSchema,
  pupillaryDistance: rangeSchema,
  dateFormats: z.array(z.string().trim().min(1)).min(1),
});

export interface ValidationPolicyOverrides {
  sphere?: Partial<QuantizationPolicy>;
  cylinder?: Partial<QuantizationPolicy>;
  add?: Partial<QuantizationPolicy>;
  addTypical?: Partial<NumericRange>;
  axis?: Partial<NumericRange>;
  pupillaryDistance?: Partial<NumericRange>;
  dateFormats?: readonly string[];
}

/**
 * Layers overrides on top of the default policy and checks the result.
 * Throws a ZodError when the merged policy is inconsistent (e.g. min >= max).
 */
export function createValidationPolicy(
  overrides: ValidationPolicyOverrides = {},
  base: ValidationPolicy = DEFAULT_VALIDATION_POLICY
): ValidationPolicy {
  const merged = {
    sphere: { ...base.sphere, ...overrides.sphere },
    cylinder: { ...base.cylinder, ...overrides.cylinder },
    add: { ...base.add, ...overrides.add },
    addTypical: { ...base.addTypical, ...overrides.addTypical },
    axis: { ...base.axis, ...overrides.axis },
    pupillaryDistance: { ...base.pupillaryDistance, ...overrides.pupillaryDistance },
    dateFormats: [...(overrides.dateFormats ?? base.dateFormats)],
  };
  return freezePolicy(policySchema.parse(merged));
}
