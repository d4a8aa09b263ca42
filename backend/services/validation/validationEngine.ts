import { validateAxis } from './axis.js';
import { normalizeDate } from './dateNormalizer.js';
import { describeRaw, isAbsent } from './fieldCoercer.js';
import { DEFAULT_VALIDATION_POLICY, type NumericRange, type QuantizationPolicy, type ValidationPolicy } from './policy.js';
import { parsePupillaryDistance } from './pupillaryDistance.js';
import { validateAddPower, validateQuantized } from './quantization.js';
import {
  accepted,
  issue,
  type CandidateEye,
  type CandidateRecord,
  type CandidateValue,
  type EyeKey,
  type FieldOutcome,
  type PupillaryDistance,
  type ValidatedEye,
  type ValidatedRecord,
  type ValidationIssue,
  type ValidationResult,
  type ValidationStatus,
} from './types.js';

/**
 * One implementation per field category. The engine takes a partial set and
 * fills the rest from the defaults, so a deployment can swap e.g. the date
 * rules without touching the optical-power ones.
 */
export interface FieldValidators {
  power(raw: CandidateValue, label: string, policy: QuantizationPolicy): FieldOutcome<number | null>;
  add(
    raw: CandidateValue,
    label: string,
    policy: QuantizationPolicy,
    typical: NumericRange
  ): FieldOutcome<number | null>;
  axis(raw: CandidateValue, cylinder: number | null, eye: string, range: NumericRange): FieldOutcome<number | null>;
  pupillaryDistance(raw: CandidateValue, range: NumericRange): FieldOutcome<PupillaryDistance | null>;
  date(raw: CandidateValue, formats: readonly string[]): FieldOutcome<string | null>;
  doctorName(raw: CandidateValue): FieldOutcome<string | null>;
}

export function normalizeDoctorName(raw: CandidateValue): FieldOutcome<string | null> {
  if (typeof raw === 'number' && Number.isFinite(raw)) return accepted(String(raw));
  if (typeof raw !== 'string') {
    return {
      value: null,
      issues: [issue('UNPARSEABLE_VALUE', 'doctor_name', `doctor_name invalid format: ${describeRaw(raw)}`)],
    };
  }
  const name = raw.replace(/\s+/g, ' ').trim();
  return accepted(name || null);
}

export const DEFAULT_FIELD_VALIDATORS: Readonly<FieldValidators> = Object.freeze({
  power: validateQuantized,
  add: validateAddPower,
  axis: validateAxis,
  pupillaryDistance: parsePupillaryDistance,
  date: normalizeDate,
  doctorName: normalizeDoctorName,
});

export interface ExtractionEnvelope {
  status?: string;
  message?: string;
  data?: CandidateRecord | null;
  diagnostics?: Record<string, unknown>;
  [extra: string]: unknown;
}

export interface ValidationDiagnostics {
  validation_notes: string[];
  validation_status: ValidationStatus;
  [extra: string]: unknown;
}

export interface ValidatedEnvelope {
  status?: string;
  message?: string;
  data: ValidatedRecord & Record<string, unknown>;
  diagnostics: ValidationDiagnostics;
  [extra: string]: unknown;
}

export interface ValidationEngineOptions {
  policy?: ValidationPolicy;
  validators?: Partial<FieldValidators>;
}

/**
 * Drives the field validators over one candidate record. Stateless between
 * calls and never throws: every problem becomes a null field plus a note.
 */
export class ValidationEngine {
  readonly policy: ValidationPolicy;
  private readonly validators: FieldValidators;

  constructor(options: ValidationEngineOptions = {}) {
    this.policy = options.policy ?? DEFAULT_VALIDATION_POLICY;
    this.validators = { ...DEFAULT_FIELD_VALIDATORS, ...options.validators };
  }

  validate(candidate: CandidateRecord): ValidationResult {
    const issues: ValidationIssue[] = [];
    const collect = <T>(field: string, run: () => FieldOutcome<T | null>, raw: CandidateValue): T | null => {
      if (isAbsent(raw)) return null;
      let outcome: FieldOutcome<T | null>;
      try {
        outcome = run();
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        outcome = {
          value: null,
          issues: [issue('UNPARSEABLE_VALUE', field, `${field} could not be validated: ${reason}`)],
        };
      }
      issues.push(...outcome.issues);
      return outcome.value;
    };

    const validateEye = (key: EyeKey): ValidatedEye => {
      const eye: CandidateEye = candidate[key] ?? {};
      const { policy, validators } = this;

      const sphere = collect(`${key} sphere`, () => validators.power(eye.sphere, `${key} sphere`, policy.sphere), eye.sphere);
      const cylinder = collect(
        `${key} cylinder`,
        () => validators.power(eye.cylinder, `${key} cylinder`, policy.cylinder),
        eye.cylinder
      );
      const axis = collect(`${key} axis`, () => validators.axis(eye.axis, cylinder, key, policy.axis), eye.axis);
      const add = collect(
        `${key} add`,
        () => validators.add(eye.add, `${key} add`, policy.add, policy.addTypical),
        eye.add
      );
      return { sphere, cylinder, axis, add };
    };

    const right_eye = validateEye('right_eye');
    const left_eye = validateEye('left_eye');
    const pupillary_distance = collect(
      'pupillary_distance',
      () => this.validators.pupillaryDistance(candidate.pupillary_distance, this.policy.pupillaryDistance),
      candidate.pupillary_distance
    );
    const date = collect('date', () => this.validators.date(candidate.date, this.policy.dateFormats), candidate.date);
    const doctor_name = collect('doctor_name', () => this.validators.doctorName(candidate.doctor_name), candidate.doctor_name);

    const notes = issues.map((entry) => entry.note);
    return {
      record: { right_eye, left_eye, pupillary_distance, doctor_name, date },
      summary: { status: notes.length === 0 ? 'passed' : 'warnings', notes, issues },
    };
  }

  /**
   * Envelope form used at the service boundary. Upstream signals "nothing
   * extracted" with a null `data`; such envelopes pass through untouched.
   */
  validateEnvelope(envelope: ExtractionEnvelope): ExtractionEnvelope | ValidatedEnvelope {
    const data = envelope.data;
    if (data === null || data === undefined) return envelope;

    const { record, summary } = this.validate(data);
    return {
      ...envelope,
      data: { ...data, ...record },
      diagnostics: {
        ...envelope.diagnostics,
        validation_notes: summary.notes,
        validation_status: summary.status,
      },
    };
  }
}
