import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const score = z.coerce.number().min(0).max(1);

const configSchema = z.object({
  // Server
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Storage
  databasePath: z.string().optional(),
  seedPath: z.string().optional(), // Used only when the store is empty
  registrySyncCron: z.string().optional(), // e.g. "*/30 * * * * *"; unset disables store sync

  // Registry
  defaultConfidenceThreshold: z.coerce.number().gt(0).lte(1).default(0.7),
  noMatchMessage: z
    .string()
    .min(1)
    .default("I'm not sure I understood. Could you tell me a bit more about what you need help with?"),

  // Classification engine
  exactWeight: z.coerce.number().min(0).default(1),
  keywordWeight: z.coerce.number().min(0).default(0.35),
  fuzzyWeight: z.coerce.number().min(0).default(0.65),
  ambiguityMargin: score.default(0.1),
  considerationFloor: score.default(0.3),
  candidateCount: z.coerce.number().int().positive().default(3),
  nearExactMaxDistance: z.coerce.number().int().min(0).default(2),

  // Ingestion and validation
  listDelimiter: z.string().min(1).default('|'),
  overlapWarningFloor: z.coerce.number().gt(0).lte(1).default(0.8),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    logLevel: env('LOG_LEVEL'),
    databasePath: env('DATABASE_PATH'),
    seedPath: env('SEED_PATH'),
    registrySyncCron: env('REGISTRY_SYNC_CRON'),
    defaultConfidenceThreshold: env('DEFAULT_CONFIDENCE_THRESHOLD'),
    noMatchMessage: env('NO_MATCH_MESSAGE'),
    exactWeight: env('SCORE_WEIGHT_EXACT'),
    keywordWeight: env('SCORE_WEIGHT_KEYWORD'),
    fuzzyWeight: env('SCORE_WEIGHT_FUZZY'),
    ambiguityMargin: env('AMBIGUITY_MARGIN'),
    considerationFloor: env('CONSIDERATION_FLOOR'),
    candidateCount: env('CANDIDATE_COUNT'),
    nearExactMaxDistance: env('NEAR_EXACT_MAX_DISTANCE'),
    listDelimiter: env('LIST_DELIMITER'),
    overlapWarningFloor: env('OVERLAP_WARNING_FLOOR'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
