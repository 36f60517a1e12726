// Config loader with precedence chain: CLI > env > defaults

import { TriageConfigSchema } from '../types/index.js';
import type { TriageConfig } from '../types/index.js';

export const ENV_PREFIX = 'DMESG_TRIAGE_';

/**
 * Convert UPPER_SNAKE_CASE key (after prefix strip) to camelCase.
 * Example: LOG_FILE -> logFile, PAGER -> pager
 */
function snakeToCamel(key: string): string {
  return key
    .toLowerCase()
    .replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * "true"/"false" become booleans; everything else stays a string.
 */
function coerceValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Extract DMESG_TRIAGE_* environment variables, strip prefix,
 * convert to camelCase, and coerce types.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== '') {
      const stripped = key.slice(ENV_PREFIX.length);
      result[snakeToCamel(stripped)] = coerceValue(value);
    }
  }
  return result;
}

/** Flags commander left unset must not mask environment values. */
function definedOnly(flags: Partial<TriageConfig>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(flags).filter(([, value]) => value !== undefined),
  );
}

/**
 * Load configuration with precedence: CLI flags > env vars > Zod defaults.
 *
 * @param cliFlags - CLI flag overrides (partial config)
 * @param env - Environment to read DMESG_TRIAGE_* variables from
 * @returns Validated TriageConfig
 */
export function loadConfig(
  cliFlags: Partial<TriageConfig>,
  env: NodeJS.ProcessEnv = process.env,
): TriageConfig {
  const merged = { ...loadEnvVars(env), ...definedOnly(cliFlags) };

  const result = TriageConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${issues}`);
  }

  return result.data;
}
