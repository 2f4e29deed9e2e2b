import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  STORAGE_DRIVER: z.enum(['sqlite', 'memory']).default('sqlite'),
  DATABASE_PATH: z.string().min(1).default('data/data.db'),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().optional(),
  EXTRACTION_MODEL: z.string().min(1).default('openai/gpt-4o-mini'),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),
  RECONCILE_AMOUNT_TOLERANCE: z.coerce.number().min(0).default(0.05),
  RECONCILE_SOFT_OVERLAP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  RECONCILE_AMOUNT_SLACK: z.coerce.number().min(0).default(1.0),
  RECONCILE_RECENCY_WINDOW_YEARS: z.coerce.number().int().min(0).default(3),
  PENDING_IMPORT_TTL_MINUTES: z.coerce.number().positive().default(30),
});

export interface AppConfig {
  server: {
    port: number;
  };
  storage: {
    driver: 'sqlite' | 'memory';
    databasePath: string;
  };
  extraction: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    timeoutMs: number;
  };
  reconciliation: {
    amountTolerance: number;
    softOverlapThreshold: number;
    amountSlack: number;
    recencyWindowYears: number;
  };
  imports: {
    pendingTtlMinutes: number;
  };
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  // Empty variables count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.parse(present);

  return {
    server: {
      port: parsed.PORT,
    },
    storage: {
      driver: parsed.STORAGE_DRIVER,
      databasePath: parsed.DATABASE_PATH,
    },
    extraction: {
      apiKey: parsed.OPENROUTER_API_KEY,
      baseUrl: parsed.OPENROUTER_BASE_URL,
      model: parsed.EXTRACTION_MODEL,
      timeoutMs: parsed.EXTRACTION_TIMEOUT_MS,
    },
    reconciliation: {
      amountTolerance: parsed.RECONCILE_AMOUNT_TOLERANCE,
      softOverlapThreshold: parsed.RECONCILE_SOFT_OVERLAP_THRESHOLD,
      amountSlack: parsed.RECONCILE_AMOUNT_SLACK,
      recencyWindowYears: parsed.RECONCILE_RECENCY_WINDOW_YEARS,
    },
    imports: {
      pendingTtlMinutes: parsed.PENDING_IMPORT_TTL_MINUTES,
    },
  };
};
