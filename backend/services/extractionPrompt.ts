import { AppError } from '../middleware/errors.js';
import { extractionResponseSchema } from '../validations/prescriptions.js';
import type { ExtractionEnvelope } from './validation/validationEngine.js';

/**
 * Instructions handed to the extraction model ahead of the OCR text. The model
 * only proposes candidates; every value it returns is re-checked by the
 * validation engine, so the prompt favours recall over precision.
 */
export const EXTRACTION_PROMPT = `You read eyeglass prescriptions. Extract the prescription values from the OCR text below.

The OCR text is noisy. Extract what you can instead of discarding it.

Fields:
1. Sphere (SPH, S, first number after OD/OS): signed, usually a multiple of 0.25, e.g. -1.25, +2.00.
2. Cylinder (CYL, C, second number): usually negative. Only when present.
3. Axis (AXIS, AX, AXS): whole degrees 0-180. Only meaningful together with a cylinder.
4. Add (ADD, reading power): positive, typically 0.75 to 3.50.
5. Pupillary distance (PD): one number, or right/left as "62/60". Typically 50-75.
6. Doctor name: any name with a title (Dr., Doctor, OD, MD).
7. Date: copy the date as printed.

OCR confusions to undo: O->0, l->1, S->5, B->8.
If a value is present but malformed, return your best reading of it. Use null only when the field is missing.
Values that sit close together on the page belong to the same field.

Reply with this JSON object and nothing else:
{
  "status": "ok | needs_review | reupload_required",
  "message": "one-line extraction summary",
  "data": {
    "right_eye": {"sphere": null, "cylinder": null, "axis": null, "add": null},
    "left_eye": {"sphere": null, "cylinder": null, "axis": null, "add": null},
    "pupillary_distance": null,
    "doctor_name": null,
    "date": null
  },
  "diagnostics": {
    "uncertain_fields": [],
    "reasons": {},
    "confidence": "high | medium | low"
  }
}

OCR TEXT:
`;

export function buildExtractionPrompt(ocrText: string, template: string = EXTRACTION_PROMPT): string {
  return `${template}\n${ocrText.trim()}\n`;
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Finds the JSON object in a model reply: fenced block first, then the outermost braces. */
function extractJsonObject(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const codeBlockMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  const inner = codeBlockMatch?.[1]?.trim();
  if (inner && inner.startsWith('{') && inner.endsWith('}')) return inner;

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return trimmed.slice(start, end + 1);
}

/**
 * Turns the model's raw reply into an extraction envelope. Throws an AppError
 * (502) when no JSON object can be recovered or it lacks `status`/`data`.
 */
export function parseExtractionResponse(raw: string): ExtractionEnvelope {
  let parsed = safeJsonParse(raw.trim());
  if (parsed === undefined) {
    const extracted = extractJsonObject(raw);
    parsed = extracted ? safeJsonParse(extracted) : undefined;
  }
  if (parsed === undefined) {
    throw new AppError(502, 'EXTRACTION_INVALID_JSON', 'Model did not return a valid JSON object');
  }

  const result = extractionResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new AppError(502, 'EXTRACTION_INVALID_RESPONSE', 'Invalid extraction response format', {
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return result.data;
}
