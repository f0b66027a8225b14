import { z } from 'zod';
import 'dotenv/config';
import { STRIKE_PROFILES } from './types/pricing.js';
import { isStrikeProfile } from './engine/profiles.js';
import type { StrikeProfile } from './types/pricing.js';

// blank values in .env count as unset
const optional = z.string().trim().optional().transform(v => v || undefined);

const profileList = z
  .string()
  .default(STRIKE_PROFILES.join(','))
  .transform((raw, ctx): StrikeProfile[] => {
    const profiles: StrikeProfile[] = [];
    for (const part of raw.split(',').map(p => p.trim().toLowerCase()).filter(Boolean)) {
      if (!isStrikeProfile(part)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown profile '${part}'` });
        return z.NEVER;
      }
      profiles.push(part);
    }
    return profiles;
  });

const configSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1),

  // Alpaca (chains, quotes, daily bars)
  ALPACA_API_KEY: optional,
  ALPACA_SECRET_KEY: optional,
  ALPACA_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),

  // Finnhub (earnings calendar, fallback quote)
  FINNHUB_API_KEY: optional,
  FINNHUB_BASE_URL: z.string().url().default('https://finnhub.io/api/v1'),

  // OpenAI (decision memos)
  OPENAI_API_KEY: optional,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),

  // Telegram
  TELEGRAM_BOT_TOKEN: optional,
  TELEGRAM_CHAT_ID: optional,

  // App
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Engine parameters
  RISK_FREE_RATE: z.coerce.number().min(0).max(1).default(0.05),
  DEFAULT_VOLATILITY: z.coerce.number().positive().default(0.30),
  MAX_DTE: z.coerce.number().int().positive().default(14),
  SCAN_PROFILES: profileList,

  // Schedules (UTC)
  SCAN_CRON: z.string().default('30 14 * * 1-5'),
  REFRESH_CRON: z.string().default('*/15 14-21 * * 1-5'),
});

type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${missing}`);
  }
  return result.data;
}

export const config = loadConfig();
export type { Config };
