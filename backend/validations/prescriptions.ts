import { z } from 'zod';

// Field values stay untyped here: the engine decides what a usable
// sphere or date looks like. These schemas only pin down the envelope shape.
const candidateEyeSchema = z
  .object({
    sphere: z.unknown(),
    cylinder: z.unknown(),
    axis: z.unknown(),
    add: z.unknown(),
  })
  .passthrough();

export const candidateRecordSchema = z
  .object({
    right_eye: candidateEyeSchema.nullable().optional(),
    left_eye: candidateEyeSchema.nullable().optional(),
    pupillary_distance: z.unknown(),
    doctor_name: z.unknown(),
    date: z.unknown(),
  })
  .passthrough();

export const extractionEnvelopeSchema = z
  .object({
    status: z.string().max(64).optional(),
    message: z.string().max(2000).optional(),
    data: candidateRecordSchema.nullable().optional(),
    diagnostics: z.record(z.unknown()).optional(),
  })
  .passthrough();

/** What the extraction model must hand back: both `status` and `data` present. */
export const extractionResponseSchema = extractionEnvelopeSchema.extend({
  status: z.string().max(64),
  data: candidateRecordSchema.nullable(),
});

const ocrTextLineSchema = z
  .object({
    text: z.string().nullable().optional(),
    confidence: z.number().finite().nullable().optional(),
  })
  .passthrough();

const ocrPageSchema = z
  .object({
    text_lines: z.array(ocrTextLineSchema).optional(),
  })
  .passthrough();

/** OCR results document: image name -> pages -> text lines. */
export const ocrResultsSchema = z.record(z.array(ocrPageSchema));

export type OcrResults = z.infer<typeof ocrResultsSchema>;
