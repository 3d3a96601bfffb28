import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),
    LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().default('gpt-4o'),
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-latest'),
    API_KEYS: optionalString,
    SENTRY_DSN: optionalString,
    MAX_INTERACTIONS: positiveInt(15),
    MEMORY_EXPIRY_DAYS: positiveInt(90),
    HISTORY_WINDOW: positiveInt(10),
    SWEEP_CRON: z.string().default('0 3 * * *'),
    PERSONA_PROMPT_PATH: z.string().default('config/persona.txt'),
    PHRASE_BANK_PATH: z.string().default('config/phrases.json'),
    BUSINESS_TIMEZONE: z.string().default('America/Chicago'),
    RENDER_TEAM_EMAIL: optionalString,
    SENDGRID_API_KEY: optionalString,
    SENDGRID_FROM_EMAIL: optionalString,
  })
  .refine((vars) => (vars.LLM_PROVIDER === 'openai' ? !!vars.OPENAI_API_KEY : !!vars.ANTHROPIC_API_KEY), {
    message: 'An API key for the selected LLM_PROVIDER is required',
    path: ['LLM_PROVIDER'],
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = typeof env;
