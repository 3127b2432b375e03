import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),

  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(8),
  TURN_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  THREAD_MAX_COUNT: z.coerce.number().int().positive().default(1000),
  THREAD_IDLE_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
  INTAKE_DATA_DIR: z.string().default('insurance_requests'),

  AMS360_BASE_URL: z.string().default('https://wsapi.ams360.com/v3/WSAPIService.svc'),
  AMS360_AGENCY_NO: optionalString,
  AMS360_LOGIN_ID: optionalString,
  AMS360_PASSWORD: optionalString,
  AMS360_TICKET_TTL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),

  AGENCYZOOM_API_KEY: optionalString,
  AGENCYZOOM_BASE_URL: z.string().default('https://api.agencyzoom.com/v1'),
  AGENCYZOOM_PIPELINE_ID: z.coerce.number().int().default(3816),
  AGENCYZOOM_STAGE_ID: z.coerce.number().int().default(11446),
  AGENCYZOOM_LEAD_SOURCE_ID: z.coerce.number().int().default(113762),
  AGENCYZOOM_ASSIGN_TO: z.coerce.number().int().default(148687),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  SENDGRID_API_KEY: optionalString,
  SENDGRID_FROM_EMAIL: optionalString,

  API_KEYS: optionalString,
  SENTRY_DSN: optionalString,
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
