import { Router } from 'express';

import { isReady } from '../config/lifecycle.js';

export const SERVICE_LABEL = 'Prescription Validation Service';

export function healthRoutes(): Router {
  const router = Router();

  // Liveness: no I/O, cannot hang.
  router.get('/health/live', (_req, res) => {
    res.status(200).json({ status: 'alive' });
  });

  // Readiness: 200 only while the server is listening and not draining.
  router.get('/health/ready', (_req, res) => {
    const ready = isReady();
    res.status(ready ? 200 : 503).json({ status: ready ? 'ready' : 'not_ready' });
  });

  router.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      service: SERVICE_LABEL,
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor(process.uptime()),
    });
  });

  return router;
}
