/**
 * Environment Configuration with Zod Validation
 *
 * Validates the tool's own TRADEDECK_* settings and provides a type-safe
 * configuration object. The stack's `.env` file is not loaded here: it is
 * the EnvironmentProfile the validator inspects, not configuration for this
 * tool.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((val) => val === 'true' || val === '1' || val === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  TRADEDECK_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  TRADEDECK_LOG_DIR: z.string().min(1).default('./logs/setup'),
  TRADEDECK_LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(14),
  TRADEDECK_LOG_TO_CONSOLE: booleanFlag.default('false'),
  TRADEDECK_LOG_TO_FILE: booleanFlag.default('true'),

  // Project layout
  TRADEDECK_PROJECT_DIR: z.string().min(1).optional(),
  TRADEDECK_COMPOSE_FILE: z.string().min(1).default('docker-compose-enhanced.yml'),
  TRADEDECK_COMPOSE_COMMAND: z.enum(['auto', 'docker compose', 'docker-compose']).default('auto'),

  // Domains
  TRADEDECK_DOMAIN_SUFFIX: z
    .string()
    .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)*\.local$/, 'TRADEDECK_DOMAIN_SUFFIX must end in .local')
    .default('tradedeck.local'),
  TRADEDECK_HOSTS_FILE: z.string().min(1).optional(),

  // Timing
  TRADEDECK_READY_TIMEOUT_SECONDS: z.coerce.number().int().nonnegative().default(120),
  TRADEDECK_READY_POLL_SECONDS: z.coerce.number().int().positive().default(5),
  TRADEDECK_GRACE_SECONDS: z.coerce.number().int().nonnegative().default(30),
  TRADEDECK_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Certificates
  TRADEDECK_CERT_KEY_BITS: z.coerce
    .number()
    .int()
    .refine((bits) => bits === 2048 || bits === 3072 || bits === 4096, {
      message: 'TRADEDECK_CERT_KEY_BITS must be 2048, 3072 or 4096',
    })
    .default(4096),
});

// =============================================================================
// VALIDATION & EXPORT
// =============================================================================

export type EnvConfig = z.infer<typeof envSchema>;

let cachedConfig: EnvConfig | null = null;

/**
 * Validates and returns the environment configuration.
 * Caches the result for subsequent calls.
 *
 * @throws {ConfigurationError} If any variable is invalid
 */
export function getEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = parseEnvConfig(process.env);
  return cachedConfig;
}

/**
 * Parses an arbitrary environment map without touching the cache.
 */
export function parseEnvConfig(source: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(
      `Environment validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues
    );
  }

  if (result.data.TRADEDECK_READY_POLL_SECONDS > Math.max(result.data.TRADEDECK_READY_TIMEOUT_SECONDS, 1)) {
    throw new ConfigurationError(
      'TRADEDECK_READY_POLL_SECONDS must not exceed TRADEDECK_READY_TIMEOUT_SECONDS',
      ['TRADEDECK_READY_POLL_SECONDS']
    );
  }

  return result.data;
}

/**
 * Resets the cached configuration.
 * Useful for testing or when environment variables change.
 */
export function resetEnvConfig(): void {
  cachedConfig = null;
}
