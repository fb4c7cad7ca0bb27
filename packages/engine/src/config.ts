import { z } from 'zod';

import { ConfigurationError } from './errors';
import { createLogger, Logger } from './logger';

export const DEFAULT_MAX_CONCURRENCY = 4;

export const EngineOptionsSchema = z.object({
  maxConcurrency: z.number().int().min(1).default(DEFAULT_MAX_CONCURRENCY),
});

export interface EngineOptions {
  /** Upper bound on nodes evaluated at the same time (respects provider rate limits) */
  maxConcurrency?: number;
  logger?: Logger;
}

export interface ResolvedEngineOptions {
  maxConcurrency: number;
  logger: Logger;
}

/**
 * @throws ConfigurationError listing every invalid option
 */
export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const parsed = EngineOptionsSchema.safeParse({ maxConcurrency: options.maxConcurrency });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid engine options: ${issues.join('; ')}`, { issues });
  }

  return {
    maxConcurrency: parsed.data.maxConcurrency,
    logger: options.logger ?? createLogger(),
  };
}
