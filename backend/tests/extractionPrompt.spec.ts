import { describe, expect, it } from 'vitest';

import { AppError } from '../middleware/errors.js';
import { buildExtractionPrompt, EXTRACTION_PROMPT, parseExtractionResponse } from '../services/extractionPrompt.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('buildExtractionPrompt', () => {
  it('appends the trimmed OCR text to the template', () => {
    expect(buildExtractionPrompt('  OD -1.00 \n')).toBe(`${EXTRACTION_PROMPT}\nOD -1.00\n`);
    expect(buildExtractionPrompt('OS', 'Read this:')).toBe('Read this:\nOS\n');
  });
});

describe('parseExtractionResponse', () => {
  it('parses a bare JSON reply', () => {
    expect(parseExtractionResponse('{"status":"ok","data":null}')).toEqual({ status: 'ok', data: null });
  });

  it('recovers JSON from a fenced code block', () => {
    const reply = 'Here you go:\n```json\n{"status":"ok","message":"m","data":{"date":"01/15/2024"}}\n```';

    expect(parseExtractionResponse(reply)).toEqual({ status: 'ok', message: 'm', data: { date: '01/15/2024' } });
  });

  it('recovers JSON surrounded by prose', () => {
    expect(parseExtractionResponse('Sure! {"status":"needs_review","data":{}} Thanks')).toEqual({
      status: 'needs_review',
      data: {},
    });
  });

  it('rejects replies without a JSON object', () => {
    const err = captureError(() => parseExtractionResponse('no json here'));

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ statusCode: 502, code: 'EXTRACTION_INVALID_JSON' });
  });

  it('rejects objects without status and data', () => {
    const err = captureError(() => parseExtractionResponse('{"message":"x"}'));

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ statusCode: 502, code: 'EXTRACTION_INVALID_RESPONSE' });
  });
});
