import { describe, expect, it, beforeAll } from 'vitest';
import request from 'supertest';

import { createApp, isOriginAllowed } from '../app.js';
import { loadEnv } from '../config/env.js';

describe('CORS origin enforcement', () => {
  let app: ReturnType<typeof createApp>;

  beforeAll(() => {
    app = createApp(loadEnv({ NODE_ENV: 'test', CORS_ORIGINS: 'https://allowed.example' }));
  });

  it('rejects requests with a disallowed Origin header', async () => {
    const res = await request(app).get('/api/health').set('Origin', 'https://evil.example');

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: { code: 'ORIGIN_NOT_ALLOWED', message: 'Origin not allowed.' } });
  });

  it('allows requests with an allowed Origin header', async () => {
    const res = await request(app).get('/api/health').set('Origin', 'https://allowed.example');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok' });
    expect(res.headers['access-control-allow-origin']).toBe('https://allowed.example');
  });

  it('normalizes entries with trailing slashes/paths/quotes', async () => {
    const app2 = createApp(
      loadEnv({ NODE_ENV: 'test', CORS_ORIGINS: '"https://allowed.example/",https://allowed.example/api' })
    );

    const res = await request(app2).get('/api/health').set('Origin', 'https://allowed.example');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok' });
  });
});

describe('isOriginAllowed', () => {
  it('allows everything when no list is configured', () => {
    expect(isOriginAllowed('https://any.example', [])).toBe(true);
  });

  it('matches host suffixes and wildcards', () => {
    expect(isOriginAllowed('https://app.clinic.example', ['.clinic.example'])).toBe(true);
    expect(isOriginAllowed('https://clinic.example.evil', ['.clinic.example'])).toBe(false);
    expect(isOriginAllowed('https://a.preview.example', ['https://*.preview.example'])).toBe(true);
  });

  it('never matches an Origin that is not a URL', () => {
    expect(isOriginAllowed('not a url', ['clinic.example'])).toBe(false);
  });
});
