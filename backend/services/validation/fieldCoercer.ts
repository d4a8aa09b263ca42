import type { CandidateValue } from './types.js';

export type CoercionResult = { ok: true; value: number } | { ok: false; value: null };

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;
// OCR output regularly carries the typographic minus instead of a hyphen.
const UNICODE_MINUS = /−/g;

const FAILED: CoercionResult = { ok: false, value: null };

/**
 * Turns a candidate into a finite number. Never throws: anything that is not a
 * finite number or a plain decimal string comes back as `{ ok: false }`.
 */
export function coerceNumber(raw: CandidateValue): CoercionResult {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { ok: true, value: raw } : FAILED;
  }
  if (typeof raw !== 'string') return FAILED;

  const text = raw.trim().replace(UNICODE_MINUS, '-');
  if (!NUMERIC_TEXT.test(text)) return FAILED;

  const value = Number(text);
  return Number.isFinite(value) ? { ok: true, value } : FAILED;
}

/** null and undefined mean "not extracted", which is not the same as malformed. */
export function isAbsent(raw: CandidateValue): raw is null | undefined {
  return raw === null || raw === undefined;
}

/** Renders a raw candidate for a note without throwing on odd inputs. */
export function describeRaw(raw: CandidateValue): string {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'bigint') return String(raw);
  if (raw === null) return 'null';
  if (raw === undefined) return 'undefined';
  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    return Object.prototype.toString.call(raw);
  }
}
