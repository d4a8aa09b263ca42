import { Router } from 'express';

import type { ValidationEngine } from '../services/validation/validationEngine.js';
import { makePrescriptionController } from '../controllers/prescriptionController.js';

export function prescriptionRoutes(engine: ValidationEngine): Router {
  const router = Router();
  const prescriptions = makePrescriptionController(engine);

  router.post('/prescriptions/validate', prescriptions.validate);
  router.post('/prescriptions/ocr', prescriptions.prepareExtraction);

  return router;
}
