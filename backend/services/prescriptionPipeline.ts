import { extractionLog } from '../config/logger.js';
import { logErrorEvent } from '../config/appLogs.js';
import type { OcrResults } from '../validations/prescriptions.js';
import { buildExtractionPrompt, parseExtractionResponse } from './extractionPrompt.js';
import { ocrText, readOcrResults, summarizeConfidence } from './ocrResults.js';
import {
  ValidationEngine,
  type ExtractionEnvelope,
  type ValidatedEnvelope,
} from './validation/validationEngine.js';

/**
 * The language-model client lives outside this service. Implementations send
 * the prompt and resolve with the model's raw text reply.
 */
export interface CandidateExtractor {
  extract(prompt: string): Promise<string>;
}

export interface PipelineDeps {
  extractor: CandidateExtractor;
  engine?: ValidationEngine;
}

export type PipelineResult = ExtractionEnvelope | ValidatedEnvelope;

export const EMPTY_OCR_MESSAGE = 'OCR text is empty. Please upload a clearer image.';

function reuploadRequired(): ExtractionEnvelope {
  return {
    status: 'reupload_required',
    message: EMPTY_OCR_MESSAGE,
    data: null,
    diagnostics: { uncertain_fields: [], reasons: {}, confidence: 'low' },
  };
}

/**
 * OCR results -> extraction model -> validation. Failures of the extraction step
 * come back as an `error` envelope; the caller always gets a result object.
 */
export async function processPrescription(doc: OcrResults, deps: PipelineDeps): Promise<PipelineResult> {
  const engine = deps.engine ?? new ValidationEngine();
  const lines = readOcrResults(doc);
  const text = ocrText(lines);

  if (!text) {
    extractionLog.warn('OCR produced no text; asking for a new upload');
    return reuploadRequired();
  }

  const confidence = summarizeConfidence(lines);
  extractionLog.debug('OCR text ready for extraction', {
    lineCount: lines.length,
    chars: text.length,
    averageConfidence: confidence.average,
  });

  try {
    const reply = await deps.extractor.extract(buildExtractionPrompt(text));
    const envelope = parseExtractionResponse(reply);
    const result = engine.validateEnvelope({
      ...envelope,
      diagnostics: { ...envelope.diagnostics, ocr_confidence_scores: confidence },
    });

    extractionLog.info('Prescription processed', {
      status: result.status,
      validationStatus: result.diagnostics?.validation_status,
      lineCount: lines.length,
    });
    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logErrorEvent({
      category: 'EXTRACTION',
      severity: 'medium',
      error: err,
      message: `Prescription extraction failed: ${message}`,
      operation: 'processPrescription',
      retryable: true,
    });
    return { status: 'error', message, data: null };
  }
}
