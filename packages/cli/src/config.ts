import { ConfigurationError, LogFormat, LogLevel } from '@strata/engine';
import { z } from 'zod';

const EnvSchema = z.object({
  STRATA_MAX_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  STRATA_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  STRATA_LOG_FORMAT: z.enum(['json', 'simple']).default('simple'),
  STRATA_SIMULATED_LATENCY_MS: z.coerce.number().int().min(0).default(0),
});

export interface CliConfig {
  maxConcurrency?: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
  latencyMs: number;
}

/**
 * Reads CLI settings from the environment.
 * The CLI logs at warn unless STRATA_LOG_LEVEL says otherwise, so progress output stays readable.
 * @throws ConfigurationError naming every invalid variable
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = EnvSchema.safeParse({
    STRATA_MAX_CONCURRENCY: env.STRATA_MAX_CONCURRENCY,
    STRATA_LOG_LEVEL: env.STRATA_LOG_LEVEL,
    STRATA_LOG_FORMAT: env.STRATA_LOG_FORMAT,
    STRATA_SIMULATED_LATENCY_MS: env.STRATA_SIMULATED_LATENCY_MS,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }

  return {
    maxConcurrency: parsed.data.STRATA_MAX_CONCURRENCY,
    logLevel: parsed.data.STRATA_LOG_LEVEL ?? 'warn',
    logFormat: parsed.data.STRATA_LOG_FORMAT,
    latencyMs: parsed.data.STRATA_SIMULATED_LATENCY_MS,
  };
}
