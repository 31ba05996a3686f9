import os from 'node:os';

import { z } from 'zod';

const envSchema = z.object({
  BURNISH_MAX_WORKERS: z
    .string()
    .regex(/^[1-9]\d*$/, { message: 'Expected a positive integer' })
    .transform((val: string) => parseInt(val, 10))
    .optional(),
  BURNISH_OUTPUT_SUFFIX: z
    .string()
    .trim()
    .regex(/^[^./\\]+$/, { message: 'Suffix must not contain dots or path separators' })
    .default('normalized'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next read validates `process.env` again.
 * Only tests change the environment after startup.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Number of files normalized concurrently when applying a pipeline to a glob.
 *
 * Priority:
 * 1. BURNISH_MAX_WORKERS environment variable (if set)
 * 2. the parallelism the host reports
 */
export function getDefaultWorkerCount(): number {
  const env = validateEnv();
  return env.BURNISH_MAX_WORKERS ?? Math.max(1, os.availableParallelism());
}

/**
 * Suffix inserted before the extension of generated output files
 * (`people.csv` becomes `people.normalized.csv`).
 */
export function getOutputSuffix(): string {
  return validateEnv().BURNISH_OUTPUT_SUFFIX;
}

/**
 * Get the current NODE_ENV value.
 * @returns 'development', 'production', or 'test'
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

export function isProduction(): boolean {
  return getNodeEnv() === 'production';
}
