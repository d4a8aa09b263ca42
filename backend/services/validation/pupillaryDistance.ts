import { coerceNumber, describeRaw } from './fieldCoercer.js';
import type { NumericRange } from './policy.js';
import { issue, type CandidateValue, type FieldOutcome, type PupillaryDistance, type ValidationIssue } from './types.js';

const FIELD = 'pupillary_distance';

function splitParts(raw: CandidateValue): CandidateValue[] {
  if (typeof raw !== 'string' || !raw.includes('/')) return [raw];
  return raw
    .split('/')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function unparseable(raw: CandidateValue): FieldOutcome<null> {
  return {
    value: null,
    issues: [issue('UNPARSEABLE_VALUE', FIELD, `PD invalid format: ${describeRaw(raw)}`)],
  };
}

/**
 * Accepts a single PD (`62`, `"62"`) or per-eye distances (`"62/60"`). Parts outside
 * the range are dropped one by one; a single unparseable part, or no part at all,
 * voids the whole value.
 */
export function parsePupillaryDistance(
  raw: CandidateValue,
  range: NumericRange
): FieldOutcome<PupillaryDistance | null> {
  const parts = splitParts(raw);
  if (parts.length === 0) return unparseable(raw);

  const numbers: number[] = [];
  for (const part of parts) {
    const coerced = coerceNumber(part);
    if (!coerced.ok) return unparseable(raw);
    numbers.push(coerced.value);
  }

  const issues: ValidationIssue[] = [];
  const kept: number[] = [];
  for (const distance of numbers) {
    if (distance < range.min || distance > range.max) {
      issues.push(
        issue('OUT_OF_RANGE', FIELD, `PD ${distance} outside typical range (${range.min}-${range.max}mm)`)
      );
    } else {
      kept.push(Math.trunc(distance));
    }
  }

  if (kept.length === 0) return { value: null, issues };
  if (kept.length === 1) return { value: kept[0] ?? null, issues };
  return { value: kept.join('/'), issues };
}
