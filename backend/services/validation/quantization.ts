import { coerceNumber, describeRaw } from './fieldCoercer.js';
import type { NumericRange, QuantizationPolicy } from './policy.js';
import { accepted, issue, type CandidateValue, type FieldOutcome } from './types.js';

// A value counts as on-grid when value/step sits this close above an integer.
const ON_GRID_EPSILON = 0.01;
// Absorbs binary float error in the tolerance comparison (2.30 -> 2.25 is 0.04999...).
const FLOAT_SLACK = 1e-9;

export function formatBound(bound: number): string {
  return bound > 0 ? `+${bound}` : String(bound);
}

function snapToStep(value: number, step: number): number {
  // Half-steps round away from zero; `|| 0` folds -0 into 0.
  return Math.sign(value) * Math.round(Math.abs(value) / step) * step || 0;
}

export function isOnGrid(value: number, step: number): boolean {
  const scaled = value / step;
  const remainder = ((scaled % 1) + 1) % 1;
  return remainder < ON_GRID_EPSILON;
}

/**
 * Sphere and cylinder rule: parse, range-check, then check the quarter-diopter
 * grid. On-grid values come back as given; off-grid values within `tolerance` of a
 * step are rounded (with a note); anything further off is dropped.
 */
export function validateQuantized(
  raw: CandidateValue,
  label: string,
  policy: QuantizationPolicy
): FieldOutcome<number | null> {
  const coerced = coerceNumber(raw);
  if (!coerced.ok) {
    return {
      value: null,
      issues: [issue('UNPARSEABLE_VALUE', label, `${label} invalid format: ${describeRaw(raw)}`)],
    };
  }

  const value = coerced.value;
  if (value < policy.min || value > policy.max) {
    const range = `${formatBound(policy.min)} to ${formatBound(policy.max)}`;
    return {
      value: null,
      issues: [issue('OUT_OF_RANGE', label, `${label} ${value} out of range (${range})`)],
    };
  }

  if (isOnGrid(value, policy.step)) return accepted(value || 0);

  const snapped = snapToStep(value, policy.step);

  if (Math.abs(snapped - value) <= policy.tolerance + FLOAT_SLACK) {
    return {
      value: snapped,
      issues: [issue('ROUNDED', label, `${label} ${value} rounded to ${snapped}`)],
    };
  }

  return {
    value: null,
    issues: [
      issue('OFF_GRID_UNCORRECTABLE', label, `${label} ${value} not valid multiple of ${policy.step}`),
    ],
  };
}

/**
 * Add power goes through the same grid rule, then two extra checks: negative adds
 * are dropped, while adds outside the usual reading band are kept and only flagged.
 */
export function validateAddPower(
  raw: CandidateValue,
  label: string,
  policy: QuantizationPolicy,
  typical: NumericRange
): FieldOutcome<number | null> {
  const outcome = validateQuantized(raw, label, policy);
  const value = outcome.value;
  if (value === null) return outcome;

  if (value < 0) {
    return {
      value: null,
      issues: [...outcome.issues, issue('OUT_OF_RANGE', label, `${label} ${value} should be positive`)],
    };
  }

  if (value < typical.min || value > typical.max) {
    const band = `${typical.min.toFixed(2)}-${typical.max.toFixed(2)}`;
    return {
      value,
      issues: [
        ...outcome.issues,
        issue('ATYPICAL_VALUE', label, `${label} ${value} outside typical range (${band})`),
      ],
    };
  }

  return outcome;
}
