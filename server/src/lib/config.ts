/**
 * Service configuration
 *
 * Reads the incoming-email settings from the environment. Call after `./env`
 * has loaded the dotenv files; tests pass an explicit env object instead.
 */

export interface IncomingEmailSettings {
  enabled: boolean;
  /** Reply address template containing the `%{key}` placeholder */
  address: string;
  /** Shared secret the mail transport sends in `X-Incoming-Email-Token` */
  token: string;
}

export interface AppConfig {
  incomingEmail: IncomingEmailSettings;
  appHost: string;
  appUrl: string;
  uploadsDir: string;
  uploadsBaseUrl: string;
  databaseUrl: string;
  redisUrl: string;
  smtpUrl: string;
  smtpFrom: string;
  port: number;
}

export class ConfigError extends Error {
  constructor(public missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const REQUIRED_VARS = [
  'INCOMING_EMAIL_ADDRESS',
  'INCOMING_EMAIL_TOKEN',
  'APP_HOST',
  'APP_URL',
  'DATABASE_URL',
  'REDIS_URL',
  'SMTP_URL',
  'SMTP_FROM',
] as const;

type RequiredVar = typeof REQUIRED_VARS[number];

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED_VARS.filter(name => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError([...missing]);
  }

  const required = (name: RequiredVar): string => (env[name] ?? '').trim();

  const port = parseInt(env.PORT ?? '3002', 10);

  return {
    incomingEmail: {
      enabled: parseBoolean(env.INCOMING_EMAIL_ENABLED, true),
      address: required('INCOMING_EMAIL_ADDRESS'),
      token: required('INCOMING_EMAIL_TOKEN'),
    },
    appHost: required('APP_HOST'),
    appUrl: required('APP_URL').replace(/\/+$/, ''),
    uploadsDir: env.UPLOADS_DIR?.trim() || 'uploads',
    uploadsBaseUrl: (env.UPLOADS_BASE_URL?.trim() || '/uploads').replace(/\/+$/, ''),
    databaseUrl: required('DATABASE_URL'),
    redisUrl: required('REDIS_URL'),
    smtpUrl: required('SMTP_URL'),
    smtpFrom: required('SMTP_FROM'),
    port: Number.isNaN(port) ? 3002 : port,
  };
}
