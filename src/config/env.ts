// src/config/env.ts
import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * dotenv doesn't override, so the first file loaded wins for each variable.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  const nodeEnv = process.env.NODE_ENV || 'development';

  const envFiles = [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, '.env.local', '.env'];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

/**
 * Resolve GOOGLE_REDIRECT_URI from its _LOCAL/_PROD variant.
 * The suffixed variable always wins over the base variable.
 */
function resolveRedirectUri(env: NodeJS.ProcessEnv): string | undefined {
  const suffix = env.NODE_ENV === 'production' ? '_PROD' : '_LOCAL';
  return env[`GOOGLE_REDIRECT_URI${suffix}`] || env.GOOGLE_REDIRECT_URI;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

/**
 * Environment variable schema.
 * Validated once at startup so a misconfigured deploy fails fast.
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Signed session cookies
  COOKIE_SECRET: z.string().min(16, 'COOKIE_SECRET must be at least 16 characters'),

  // Google OAuth + Calendar
  GOOGLE_CLIENT_ID: z.string().min(1, 'GOOGLE_CLIENT_ID is required'),
  GOOGLE_CLIENT_SECRET: z.string().min(1, 'GOOGLE_CLIENT_SECRET is required'),
  GOOGLE_REDIRECT_URI: z.string().url('GOOGLE_REDIRECT_URI must be a valid URL'),
  GOOGLE_CALENDAR_ID: z.string().default('primary'),

  // Per-session event cache files
  CACHE_DIR: z.string().default('./data'),

  // Language model
  AI_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  AI_API_KEY: optionalString,
  AI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  AI_MODEL: optionalString,

  // Speech synthesis (OpenAI only)
  TTS_MODEL: z.string().default('tts-1'),
  TTS_VOICE: z.string().default('alloy'),

  // Sessions and sync
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(1440),
  SYNC_EVENT_LIMIT: z.coerce.number().int().positive().max(250).default(50),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Typed application configuration derived from the environment
 */
export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  port: number;
  host: string;
  logLevel: EnvConfig['LOG_LEVEL'];
  cookieSecret: string;
  google: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    calendarId: string;
  };
  cacheDir: string;
  ai: {
    provider: EnvConfig['AI_PROVIDER'];
    apiKey?: string;
    baseUrl?: string;
    model?: string;
  };
  tts: {
    model: string;
    voice: string;
  };
  sessionTtlMs: number;
  syncEventLimit: number;
}

/**
 * Parse and validate the environment.
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse({
    ...env,
    GOOGLE_REDIRECT_URI: resolveRedirectUri(env),
  });

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration - ${problems}`);
  }

  const data = result.data;

  return {
    nodeEnv: data.NODE_ENV,
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    cookieSecret: data.COOKIE_SECRET,
    google: {
      clientId: data.GOOGLE_CLIENT_ID,
      clientSecret: data.GOOGLE_CLIENT_SECRET,
      redirectUri: data.GOOGLE_REDIRECT_URI,
      calendarId: data.GOOGLE_CALENDAR_ID,
    },
    cacheDir: data.CACHE_DIR,
    ai: {
      provider: data.AI_PROVIDER,
      apiKey: data.AI_API_KEY,
      baseUrl: data.AI_BASE_URL,
      model: data.AI_MODEL,
    },
    tts: {
      model: data.TTS_MODEL,
      voice: data.TTS_VOICE,
    },
    sessionTtlMs: data.SESSION_TTL_MINUTES * 60 * 1000,
    syncEventLimit: data.SYNC_EVENT_LIMIT,
  };
}
