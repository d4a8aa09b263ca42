import { describe, expect, it, beforeAll } from 'vitest';
import request from 'supertest';

import { createApp } from '../app.js';
import { loadEnv } from '../config/env.js';
import { buildExtractionPrompt } from '../services/extractionPrompt.js';
import { createValidationPolicy } from '../services/validation/policy.js';
import { ValidationEngine } from '../services/validation/validationEngine.js';

describe('POST /api/prescriptions/validate', () => {
  let app: ReturnType<typeof createApp>;

  beforeAll(() => {
    app = createApp(loadEnv({ NODE_ENV: 'test' }));
  });

  it('returns the validated record with notes', async () => {
    const res = await request(app)
      .post('/api/prescriptions/validate')
      .send({
        status: 'ok',
        data: {
          right_eye: { sphere: -2.3, cylinder: -0.75, axis: 180 },
          left_eye: { sphere: -2.25, cylinder: 0, axis: 175 },
        },
      });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'ok',
      data: {
        right_eye: { sphere: -2.25, cylinder: -0.75, axis: 180, add: null },
        left_eye: { sphere: -2.25, cylinder: 0, axis: null, add: null },
        pupillary_distance: null,
        doctor_name: null,
        date: null,
      },
      diagnostics: {
        validation_notes: ['right_eye sphere -2.3 rounded to -2.25', 'left_eye axis invalid (cylinder is 0)'],
        validation_status: 'warnings',
      },
    });
  });

  it('passes envelopes without data straight through', async () => {
    const envelope = { status: 'reupload_required', message: 'Image too blurry', data: null };

    const res = await request(app).post('/api/prescriptions/validate').send(envelope);

    expect(res.status).toBe(200);
    expect(res.body).toEqual(envelope);
  });

  it('rejects envelopes of the wrong shape', async () => {
    const res = await request(app).post('/api/prescriptions/validate').send({ status: 5, data: 'x' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('BAD_REQUEST');
    expect(res.body.error.details.map((d: { path: string }) => d.path)).toEqual(['status', 'data']);
  });

  it('blocks control characters in the body', async () => {
    const res = await request(app)
      .post('/api/prescriptions/validate')
      .send({ status: 'ok', message: 'a\u0000b', data: null });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: { code: 'BAD_REQUEST', message: 'The request contains invalid characters.' } });
  });

  it('uses the engine the app was built with', async () => {
    const strict = createApp(loadEnv({ NODE_ENV: 'test' }), {
      engine: new ValidationEngine({ policy: createValidationPolicy({ pupillaryDistance: { min: 55, max: 70 } }) }),
    });

    const res = await request(strict)
      .post('/api/prescriptions/validate')
      .send({ status: 'ok', data: { pupillary_distance: '52' } });

    expect(res.body.data.pupillary_distance).toBeNull();
    expect(res.body.diagnostics.validation_notes).toEqual(['PD 52 outside typical range (55-70mm)']);
  });

  it('applies policy overrides from the environment', async () => {
    const tolerant = createApp(loadEnv({ NODE_ENV: 'test', CORRECTION_TOLERANCE: '0.1' }));

    const res = await request(tolerant)
      .post('/api/prescriptions/validate')
      .send({ status: 'ok', data: { right_eye: { sphere: 1.1 } } });

    expect(res.body.data.right_eye.sphere).toBe(1);
    expect(res.body.diagnostics.validation_notes).toEqual(['right_eye sphere 1.1 rounded to 1']);
  });
});

describe('POST /api/prescriptions/ocr', () => {
  let app: ReturnType<typeof createApp>;

  beforeAll(() => {
    app = createApp(loadEnv({ NODE_ENV: 'test' }));
  });

  it('turns OCR results into extraction input', async () => {
    const res = await request(app)
      .post('/api/prescriptions/ocr')
      .send({ 'rx.png': [{ text_lines: [{ text: 'OD -1.00', confidence: 0.5 }] }] });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      text: 'OD -1.00',
      lineCount: 1,
      confidence: { average: 0.5, samples: [{ text: 'OD -1.00', confidence: 0.5 }] },
      prompt: buildExtractionPrompt('OD -1.00'),
    });
  });

  it('returns no prompt when OCR found nothing', async () => {
    const res = await request(app).post('/api/prescriptions/ocr').send({});

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ text: '', lineCount: 0, confidence: { average: 0, samples: [] }, prompt: null });
  });

  it('rejects documents that are not OCR results', async () => {
    const res = await request(app).post('/api/prescriptions/ocr').send({ 'rx.png': 'not pages' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('BAD_REQUEST');
  });
});

describe('unknown routes', () => {
  it('returns 404 NOT_FOUND with the route outside production', async () => {
    const app = createApp(loadEnv({ NODE_ENV: 'test' }));

    const res = await request(app).get('/api/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found: GET /api/nope' } });
  });
});
