import { z } from 'zod';
import { fitMethodSchema, logLevelSchema } from './config';

// ============================================================================
// Helpers
// ============================================================================

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

// ============================================================================
// ENV SCHEMA (.env file)
// ============================================================================

export const envSchema = z
  .object({
    LOG_LEVEL: z.preprocess(blankToUndefined, logLevelSchema.optional()),
    USL_FIT_METHOD: z.preprocess(blankToUndefined, fitMethodSchema.optional()),
  })
  .strict();

export type EnvSchema = z.infer<typeof envSchema>;
