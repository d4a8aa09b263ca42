import { coerceNumber, describeRaw } from './fieldCoercer.js';
import type { NumericRange } from './policy.js';
import { accepted, issue, type CandidateValue, type FieldOutcome } from './types.js';

/**
 * Axis only means something next to a non-zero cylinder, so the cylinder passed
 * in must already be validated. Fractional degrees are truncated, never rounded.
 */
export function validateAxis(
  raw: CandidateValue,
  cylinder: number | null,
  eye: string,
  range: NumericRange
): FieldOutcome<number | null> {
  const field = `${eye} axis`;

  // A missing cylinder reads the same as a zero one: no cylinder power to orient.
  if (cylinder === null || cylinder === 0) {
    return {
      value: null,
      issues: [issue('DEPENDENT_FIELD_INVALID', field, `${field} invalid (cylinder is 0)`)],
    };
  }

  const coerced = coerceNumber(raw);
  if (!coerced.ok) {
    return {
      value: null,
      issues: [issue('UNPARSEABLE_VALUE', field, `${field} invalid format: ${describeRaw(raw)}`)],
    };
  }

  const degrees = Math.trunc(coerced.value) || 0;
  if (degrees < range.min || degrees > range.max) {
    return {
      value: null,
      issues: [
        issue('OUT_OF_RANGE', field, `${field} ${degrees} out of range (${range.min}-${range.max})`),
      ],
    };
  }

  return accepted(degrees);
}
