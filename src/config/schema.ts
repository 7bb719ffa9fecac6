import type { PlaysConfig, ProviderCredentials } from '../types/plays';
import { z } from 'zod';

export const DEFAULT_SETS_FILE = '../all-sets.md';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36';

const allowedLogLevels = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'] as const;

// Blank values in .env files mean "not configured"
const optionalString = () =>
  z.preprocess((v) => {
    if (typeof v !== 'string') return v;
    const s = v.trim();
    return s === '' ? undefined : s;
  }, z.string().optional());

const logLevel = () =>
  z.preprocess((v) => {
    if (typeof v !== 'string') return undefined;
    const s = v.trim().toLowerCase();
    return allowedLogLevels.find((level) => level === s);
  }, z.enum(allowedLogLevels).optional());

const EnvSchema = z.object({
  SETS_FILE: optionalString(),
  HTTP_USER_AGENT: optionalString(),

  SOUNDCLOUD_OAUTH_TOKEN: optionalString(),
  SOUNDCLOUD_CLIENT_ID: optionalString(),
  SOUNDCLOUD_CLIENT_SECRET: optionalString(),
  YOUTUBE_API_KEY: optionalString(),

  LOG_LEVEL: logLevel(),
  LOG_FILE: optionalString(),
});

type Env = z.infer<typeof EnvSchema>;

function parseEnv(env: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export function loadPlaysConfig(env: NodeJS.ProcessEnv = process.env): PlaysConfig {
  const parsed = parseEnv(env);
  return {
    setsFile: parsed.SETS_FILE ?? DEFAULT_SETS_FILE,
    userAgent: parsed.HTTP_USER_AGENT ?? DEFAULT_USER_AGENT,
    logging: {
      level: parsed.LOG_LEVEL ?? 'info',
      ...(parsed.LOG_FILE ? { file: parsed.LOG_FILE } : {}),
    },
  };
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): ProviderCredentials {
  const parsed = parseEnv(env);
  return {
    soundcloud: {
      ...(parsed.SOUNDCLOUD_OAUTH_TOKEN ? { oauthToken: parsed.SOUNDCLOUD_OAUTH_TOKEN } : {}),
      ...(parsed.SOUNDCLOUD_CLIENT_ID ? { clientId: parsed.SOUNDCLOUD_CLIENT_ID } : {}),
      ...(parsed.SOUNDCLOUD_CLIENT_SECRET ? { clientSecret: parsed.SOUNDCLOUD_CLIENT_SECRET } : {}),
    },
    youtube: {
      ...(parsed.YOUTUBE_API_KEY ? { apiKey: parsed.YOUTUBE_API_KEY } : {}),
    },
  };
}
