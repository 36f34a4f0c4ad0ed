import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenv.config();

const SUMMARY_METHODS = ['auto', 'extractive', 'keyword', 'lead'] as const;

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  CONTENT_MAX_LENGTH: z.coerce.number().int().positive().default(5000),
  SUMMARY_MAX_LENGTH: z.coerce.number().int().min(50).default(500),
  SUMMARY_METHOD: z.enum(SUMMARY_METHODS).default('auto'),
  SUMMARIZE: flag.default('true'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  MAX_ARTICLES: z.coerce.number().int().min(1).max(50).default(5),
  FEEDS_FILE: z.string().min(1).optional(),
  // extraction tuning
  MIN_PARAGRAPH_LENGTH: z.coerce.number().int().min(1).default(50),
  MIN_PARAGRAPHS: z.coerce.number().int().min(1).default(3),
  MIN_PARAGRAPHS_SHORT: z.coerce.number().int().min(1).default(2),
  STRUCTURED_DATA_MIN_LENGTH: z.coerce.number().int().min(0).default(200),
  DUPLICATE_OVERLAP: z.coerce.number().min(0).max(1).default(0.8),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings mean "unset", as in a .env line with no value
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}
