/**
 * Validates a candidate extraction envelope stored as JSON and prints the result.
 *
 *   tsx backend/scripts/validateFile.ts path/to/candidate.json
 */
import fs from 'node:fs/promises';
import path from 'node:path';

import { loadDotenv } from '../config/dotenvLoader.js';
import { loadEnv, policyFromEnv } from '../config/env.js';
import { ValidationEngine } from '../services/validation/validationEngine.js';
import { extractionEnvelopeSchema } from '../validations/prescriptions.js';

async function run(): Promise<void> {
  const [file] = process.argv.slice(2);
  if (!file) {
    process.stderr.write('Usage: tsx backend/scripts/validateFile.ts <candidate.json>\n');
    process.exitCode = 1;
    return;
  }

  loadDotenv();
  const env = loadEnv();
  const engine = new ValidationEngine({ policy: policyFromEnv(env) });

  const raw = await fs.readFile(path.resolve(file), 'utf8');
  const envelope = extractionEnvelopeSchema.parse(JSON.parse(raw));
  const result = engine.validateEnvelope(envelope);

  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

run().catch((err: unknown) => {
  process.stderr.write(`validateFile failed: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
