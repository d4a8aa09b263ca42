// Shapes shared by the prescription validators and the engine that drives them.

export type EyeKey = 'right_eye' | 'left_eye';

/** Field values straight from the extraction step; anything can show up here. */
export type CandidateValue = unknown;

export interface CandidateEye {
  sphere?: CandidateValue;
  cylinder?: CandidateValue;
  axis?: CandidateValue;
  add?: CandidateValue;
  [extra: string]: unknown;
}

export interface CandidateRecord {
  right_eye?: CandidateEye | null;
  left_eye?: CandidateEye | null;
  pupillary_distance?: CandidateValue;
  doctor_name?: CandidateValue;
  date?: CandidateValue;
  [extra: string]: unknown;
}

// Type aliases (not interfaces) so validated output can be fed back in as a candidate.
export type ValidatedEye = {
  sphere: number | null;
  cylinder: number | null;
  axis: number | null;
  add: number | null;
};

/** Single PD as an integer, or per-eye distances as `"62/60"`. */
export type PupillaryDistance = number | string;

export type ValidatedRecord = {
  right_eye: ValidatedEye;
  left_eye: ValidatedEye;
  pupillary_distance: PupillaryDistance | null;
  doctor_name: string | null;
  /** `YYYY-MM-DD`, or the raw text when no known pattern matched. */
  date: string | null;
};

export type ValidationIssueKind =
  | 'UNPARSEABLE_VALUE'
  | 'OUT_OF_RANGE'
  | 'OFF_GRID_UNCORRECTABLE'
  | 'DEPENDENT_FIELD_INVALID'
  | 'ROUNDED'
  | 'ATYPICAL_VALUE';

export interface ValidationIssue {
  kind: ValidationIssueKind;
  field: string;
  note: string;
}

export interface FieldOutcome<T> {
  value: T;
  issues: ValidationIssue[];
}

export type ValidationStatus = 'passed' | 'warnings';

export interface ValidationSummary {
  status: ValidationStatus;
  notes: string[];
  issues: ValidationIssue[];
}

export interface ValidationResult {
  record: ValidatedRecord;
  summary: ValidationSummary;
}

export function accepted<T>(value: T): FieldOutcome<T> {
  return { value, issues: [] };
}

export function issue(kind: ValidationIssueKind, field: string, note: string): ValidationIssue {
  return { kind, field, note };
}
