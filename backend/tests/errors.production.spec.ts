import express from 'express';
import request from 'supertest';

import { AppError, errorHandler, notFoundHandler } from '../middleware/errors.js';

describe('error handler production behavior', () => {
  const originalNodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv;
  });

  it('does not leak exception messages in production', async () => {
    process.env.NODE_ENV = 'production';

    const app = express();
    app.get('/boom', () => {
      throw new Error('secret details');
    });
    app.use(errorHandler);

    const res = await request(app).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'Something went wrong. Please try again later.',
      },
    });
  });

  it('includes exception messages in non-production for debugging', async () => {
    process.env.NODE_ENV = 'test';

    const app = express();
    app.get('/boom', () => {
      throw new Error('debug details');
    });
    app.use(errorHandler);

    const res = await request(app).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'debug details',
      },
    });
  });

  it('renders AppErrors with their own status and code', async () => {
    const app = express();
    app.get('/upstream', () => {
      throw new AppError(502, 'EXTRACTION_INVALID_JSON', 'Model did not return a valid JSON object');
    });
    app.use(errorHandler);

    const res = await request(app).get('/upstream');

    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      error: { code: 'EXTRACTION_INVALID_JSON', message: 'Model did not return a valid JSON object' },
    });
  });

  it('hides the route in production 404s', async () => {
    process.env.NODE_ENV = 'production';

    const app = express();
    app.use(notFoundHandler);

    const res = await request(app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'The requested endpoint does not exist.' } });
  });
});
