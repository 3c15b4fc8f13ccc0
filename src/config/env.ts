import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_REPORT_SCAN_LIMIT, DEFAULT_SEEK_SCAN_LIMIT } from '../modules/yield/expirations.js';

const configSchema = z.object({
  TOKEN: z.string().min(1),
  DB_CONNECTION_STRING: z.string().min(1).optional(),

  CHAIN_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(900),
  FETCH_DELAY_MS: z.coerce.number().int().nonnegative().default(500),

  REPORT_SCAN_LIMIT: z.coerce.number().int().positive().default(DEFAULT_REPORT_SCAN_LIMIT),
  SEEK_SCAN_LIMIT: z.coerce.number().int().positive().default(DEFAULT_SEEK_SCAN_LIMIT),
  DEFAULT_MIN_RETURN_PCT: z.coerce.number().nonnegative().default(15),
  DEFAULT_STRIKE: z.coerce.number().positive().default(170),
});

export type Config = z.infer<typeof configSchema>;

export type EvaluationSettings = Pick<
  Config,
  'REPORT_SCAN_LIMIT' | 'SEEK_SCAN_LIMIT' | 'DEFAULT_MIN_RETURN_PCT' | 'DEFAULT_STRIKE'
>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const invalid = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${invalid}`);
  }
  return result.data;
}
