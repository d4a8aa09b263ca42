import { DateTime } from 'luxon';

import { describeRaw } from './fieldCoercer.js';
import { accepted, issue, type CandidateValue, type FieldOutcome } from './types.js';

// Two-digit years up to this value land in the 2000s, later ones in the 1900s.
const TWO_DIGIT_YEAR_PIVOT = 68;

const TWO_DIGIT_YEAR_TOKEN = /(?<![A-Za-z])yy(?![A-Za-z])/;

function expandTwoDigitYear(digits: number): number {
  return digits <= TWO_DIGIT_YEAR_PIVOT ? 2000 + digits : 1900 + digits;
}

/**
 * luxon reads `yy` as "two to four digits" and pivots at its own cutoff. For a
 * format with a `yy` token, the matching digit run must be exactly two digits; it
 * is widened here and the format switched to `yyyy`. Returns null when the text
 * cannot fit the format.
 */
function withFourDigitYear(text: string, format: string): { text: string; format: string } | null {
  if (!TWO_DIGIT_YEAR_TOKEN.test(format)) return { text, format };

  const tokens = format.split(/[^A-Za-z]+/).filter(Boolean);
  const runs = text.match(/\d+/g) ?? [];
  const yearIndex = tokens.indexOf('yy');
  const digits = runs[yearIndex];
  if (runs.length !== tokens.length || digits === undefined || digits.length !== 2) return null;

  let index = -1;
  const widened = text.replace(/\d+/g, (run) => {
    index += 1;
    return index === yearIndex ? String(expandTwoDigitYear(Number(run))) : run;
  });
  return { text: widened, format: format.replace(TWO_DIGIT_YEAR_TOKEN, 'yyyy') };
}

/**
 * Tries each format in order against the whole string and renders the first
 * real calendar date as `YYYY-MM-DD`. Formats overlap, so order decides:
 * "01/15/2024" matches `M/d/yyyy` straight away, while "15/01/2024" only fits
 * once `d/M/yyyy` is reached because month 15 does not exist.
 *
 * Unparseable dates are kept as text (a reviewer can still read them) and noted.
 */
export function normalizeDate(raw: CandidateValue, formats: readonly string[]): FieldOutcome<string | null> {
  const text = describeRaw(raw).trim();

  for (const format of formats) {
    const attempt = withFourDigitYear(text, format);
    if (!attempt) continue;
    const parsed = DateTime.fromFormat(attempt.text, attempt.format, { zone: 'utc' });
    if (!parsed.isValid) continue;
    const iso = parsed.toISODate();
    if (iso) return accepted(iso);
  }

  return {
    value: text,
    issues: [issue('UNPARSEABLE_VALUE', 'date', `Date ${describeRaw(raw)} could not be parsed to ISO format`)],
  };
}
