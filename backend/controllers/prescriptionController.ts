import type { NextFunction, Request, Response } from 'express';

import { validationLog } from '../config/logger.js';
import { getRequestId } from '../middleware/errors.js';
import { buildExtractionPrompt } from '../services/extractionPrompt.js';
import { ocrText, readOcrResults, summarizeConfidence } from '../services/ocrResults.js';
import type { ValidationEngine } from '../services/validation/validationEngine.js';
import { extractionEnvelopeSchema, ocrResultsSchema } from '../validations/prescriptions.js';

export function makePrescriptionController(engine: ValidationEngine) {
  return {
    validate: (req: Request, res: Response, next: NextFunction) => {
      try {
        const envelope = extractionEnvelopeSchema.parse(req.body);
        const result = engine.validateEnvelope(envelope);

        const notes = result.diagnostics?.validation_notes;
        validationLog.info('Prescription validated', {
          requestId: getRequestId(res),
          status: result.diagnostics?.validation_status ?? 'skipped',
          noteCount: Array.isArray(notes) ? notes.length : 0,
        });

        res.json(result);
      } catch (err) {
        next(err);
      }
    },

    prepareExtraction: (req: Request, res: Response, next: NextFunction) => {
      try {
        const doc = ocrResultsSchema.parse(req.body);
        const lines = readOcrResults(doc);
        const text = ocrText(lines);

        res.json({
          text,
          lineCount: lines.length,
          confidence: summarizeConfidence(lines),
          prompt: text ? buildExtractionPrompt(text) : null,
        });
      } catch (err) {
        next(err);
      }
    },
  };
}
