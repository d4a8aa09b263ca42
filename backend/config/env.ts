import { z } from 'zod';

import {
  createValidationPolicy,
  type ValidationPolicy,
  type ValidationPolicyOverrides,
} from '../services/validation/policy.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),

  // Candidate records are small JSON documents; OCR result uploads are the largest bodies.
  // Uses `bytes` package syntax (e.g. '1mb', '500kb').
  REQUEST_BODY_LIMIT: z.string().trim().min(1).default('1mb'),

  CORS_ORIGINS: z.string().default(''),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(300),
  LOG_DIR: z.string().trim().min(1).optional(),

  // Validation policy overrides. Unset keys keep the built-in defaults.
  PD_MIN_MM: z.coerce.number().positive().optional(),
  PD_MAX_MM: z.coerce.number().positive().optional(),
  ADD_TYPICAL_MIN: z.coerce.number().nonnegative().optional(),
  ADD_TYPICAL_MAX: z.coerce.number().positive().optional(),
  CORRECTION_TOLERANCE: z.coerce.number().nonnegative().max(0.125).optional(),
});

export type Env = z.infer<typeof envSchema>;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n');
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(processEnv);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration:\n${formatIssues(parsed.error.issues)}`);
  }

  const env = parsed.data;

  // An explicit allowlist is mandatory once the service is exposed.
  if (env.NODE_ENV === 'production' && !parseCorsOrigins(env.CORS_ORIGINS).length) {
    throw new Error(
      'Invalid environment configuration:\nCORS_ORIGINS: must be set to a comma-separated list of allowed origins/hosts in production'
    );
  }

  // Surface inconsistent policy overrides at startup rather than on the first request.
  policyFromEnv(env);

  return env;
}

export function policyFromEnv(env: Env): ValidationPolicy {
  const overrides: ValidationPolicyOverrides = {};

  if (env.PD_MIN_MM !== undefined || env.PD_MAX_MM !== undefined) {
    overrides.pupillaryDistance = {
      ...(env.PD_MIN_MM !== undefined ? { min: env.PD_MIN_MM } : {}),
      ...(env.PD_MAX_MM !== undefined ? { max: env.PD_MAX_MM } : {}),
    };
  }
  if (env.ADD_TYPICAL_MIN !== undefined || env.ADD_TYPICAL_MAX !== undefined) {
    overrides.addTypical = {
      ...(env.ADD_TYPICAL_MIN !== undefined ? { min: env.ADD_TYPICAL_MIN } : {}),
      ...(env.ADD_TYPICAL_MAX !== undefined ? { max: env.ADD_TYPICAL_MAX } : {}),
    };
  }
  if (env.CORRECTION_TOLERANCE !== undefined) {
    const tolerance = env.CORRECTION_TOLERANCE;
    overrides.sphere = { tolerance };
    overrides.cylinder = { tolerance };
    overrides.add = { tolerance };
  }

  try {
    return createValidationPolicy(overrides);
  } catch (err) {
    if (err instanceof z.ZodError) {
      throw new Error(`Invalid environment configuration:\n${formatIssues(err.issues)}`);
    }
    throw err;
  }
}

export function parseCorsOrigins(raw: string): string[] {
  const stripOuterQuotes = (value: string) => {
    const v = value.trim();
    if ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'"))) {
      return v.slice(1, -1).trim();
    }
    return v;
  };

  const normalizeEntry = (value: string): string | null => {
    let v = stripOuterQuotes(value).replace(/\/+$/, '');
    if (!v) return null;

    // Concrete URLs collapse to their origin ("https://host/app" -> "https://host").
    if ((v.startsWith('http://') || v.startsWith('https://')) && !v.includes('*')) {
      try {
        const url = new URL(v);
        return `${url.protocol}//${url.host}`;
      } catch {
        // Not a parseable URL; treat it as a hostname entry below.
      }
    }

    const slashIdx = v.indexOf('/');
    if (slashIdx !== -1) v = v.slice(0, slashIdx);
    return v.trim() || null;
  };

  return raw
    .split(',')
    .map((s) => normalizeEntry(s))
    .filter((s): s is string => Boolean(s));
}
