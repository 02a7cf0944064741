import { z } from 'zod';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

export type Config = Readonly<{
  LOG_LEVEL: LogLevel;

  // Output caps. These bound document size on hot-changing resources; they never truncate
  // an individual record delta.
  MAX_CHANGED_ELEMENTS: number;
  MAX_BYTE_REGIONS: number;
  BYTE_REGION_DISPLAY_BYTES: number;
  MAX_WORD_DIFFS: number;
  MAX_BYTE_DIFFS: number;

  /** Largest whole-resource read issued when describing what a write changed. */
  MAX_READ_BYTES: number;
  SCHEMA_CACHE_MAX_ENTRIES: number;
}>;

type Env = Record<string, string | undefined>;

const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevels).default('info'),
  MAX_CHANGED_ELEMENTS: z.coerce.number().int().min(1).default(3),
  MAX_BYTE_REGIONS: z.coerce.number().int().min(1).default(3),
  BYTE_REGION_DISPLAY_BYTES: z.coerce.number().int().min(1).max(4096).default(16),
  MAX_WORD_DIFFS: z.coerce.number().int().min(0).default(8),
  MAX_BYTE_DIFFS: z.coerce.number().int().min(0).default(8),
  MAX_READ_BYTES: z.coerce.number().int().min(1).default(64 * 1024),
  SCHEMA_CACHE_MAX_ENTRIES: z.coerce.number().int().min(0).default(64),
});

export function loadConfig(env: Env = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  if (raw.BYTE_REGION_DISPLAY_BYTES > raw.MAX_READ_BYTES) {
    throw new Error('BYTE_REGION_DISPLAY_BYTES must not exceed MAX_READ_BYTES');
  }

  return {
    LOG_LEVEL: raw.LOG_LEVEL,
    MAX_CHANGED_ELEMENTS: raw.MAX_CHANGED_ELEMENTS,
    MAX_BYTE_REGIONS: raw.MAX_BYTE_REGIONS,
    BYTE_REGION_DISPLAY_BYTES: raw.BYTE_REGION_DISPLAY_BYTES,
    MAX_WORD_DIFFS: raw.MAX_WORD_DIFFS,
    MAX_BYTE_DIFFS: raw.MAX_BYTE_DIFFS,
    MAX_READ_BYTES: raw.MAX_READ_BYTES,
    SCHEMA_CACHE_MAX_ENTRIES: raw.SCHEMA_CACHE_MAX_ENTRIES,
  };
}
