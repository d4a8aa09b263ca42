import type { OcrResults } from '../validations/prescriptions.js';

export interface OcrLine {
  text: string;
  confidence: number;
}

export interface OcrConfidenceSummary {
  average: number;
  samples: OcrLine[];
}

const CONFIDENCE_SAMPLE_SIZE = 10;

function roundTo3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Flattens an OCR results document (image -> pages -> text lines) into the
 * non-blank lines in reading order. Missing confidences count as 0.
 */
export function readOcrResults(doc: OcrResults): OcrLine[] {
  const lines: OcrLine[] = [];
  for (const pages of Object.values(doc)) {
    for (const page of pages) {
      for (const line of page.text_lines ?? []) {
        const text = (line.text ?? '').trim();
        if (!text) continue;
        lines.push({ text, confidence: roundTo3(line.confidence ?? 0) });
      }
    }
  }
  return lines;
}

export function ocrText(lines: readonly OcrLine[]): string {
  return lines.map((line) => line.text).join('\n');
}

export function summarizeConfidence(
  lines: readonly OcrLine[],
  sampleSize = CONFIDENCE_SAMPLE_SIZE
): OcrConfidenceSummary {
  if (!lines.length) return { average: 0, samples: [] };
  const total = lines.reduce((sum, line) => sum + line.confidence, 0);
  return {
    average: roundTo3(total / lines.length),
    samples: lines.slice(0, sampleSize),
  };
}
