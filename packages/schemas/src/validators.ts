import type { ZodError } from 'zod';
import {
  ConfigurationRangeError,
  SchemaValidationError,
} from '@epirisk/shared/src/utils/errors.js';
import { AppConfigSchema } from './app-config.schema.js';
import type { AppConfig } from './app-config.schema.js';
import { ScoringConfigSchema } from './scoring-config.schema.js';
import type { ScoringConfig, ScoringConfigInput } from './scoring-config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * Every scoring option is a probability, threshold or weight, so all of them
 * live in the unit interval.
 */
export function assertScoringRanges(config: ScoringConfig): void {
  for (const [option, value] of Object.entries(config)) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationRangeError(
        `Scoring option ${option} must be within [0, 1], got ${String(value)}`,
        option,
        value,
      );
    }
  }
}

export function validateScoringConfig(data: unknown): ScoringConfig {
  const result = ScoringConfigSchema.safeParse(data ?? {});

  if (!result.success) {
    throw new SchemaValidationError('Invalid scoring configuration', formatZodErrors(result.error));
  }

  const config = Object.freeze(result.data);
  assertScoringRanges(config);
  return config;
}

export function resolveScoringConfig(overrides: ScoringConfigInput = {}): ScoringConfig {
  return validateScoringConfig(overrides);
}

export function validateAppConfig(data: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid application configuration', formatZodErrors(result.error));
  }

  assertScoringRanges(result.data.scoring);
  return result.data;
}
