import { z } from 'zod';
import type { ProviderConfig } from './types.js';
import { ConfigurationError } from './types.js';

export const DEFAULT_BOT_USERNAME = 'autotranslate-bot';

export interface BotIdentity {
  username: string;
  iconUrl?: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logLevel: string;
  port: number;
  databasePath: string;
  /** Shared secret the chat server presents on every `/api` call. */
  apiToken: string;
  chatServer: {
    url: string;
    token: string;
  };
  bot: BotIdentity;
  provider: ProviderConfig;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} must not be empty`);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DATABASE_PATH: z.string().trim().min(1).default('./autotranslate.db'),
  API_TOKEN: requiredString('API_TOKEN'),
  CHAT_SERVER_URL: requiredString('CHAT_SERVER_URL').url('CHAT_SERVER_URL must be a URL'),
  CHAT_BOT_TOKEN: requiredString('CHAT_BOT_TOKEN'),
  BOT_USERNAME: optionalString,
  BOT_ICON_URL: optionalString,
  TRANSLATION_PROVIDER: z.enum(['managed-api', 'completion-llm', 'chat-llm'], {
    errorMap: () => ({
      message: 'TRANSLATION_PROVIDER must be one of: managed-api, completion-llm, chat-llm',
    }),
  }),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_REGION: optionalString,
  LLM_API_URL: optionalString,
  LLM_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

type Env = z.infer<typeof EnvSchema>;

function required(value: string | undefined, field: string, kind: string): string {
  if (!value) {
    throw new ConfigurationError(`${field} is required when TRANSLATION_PROVIDER=${kind}`, field);
  }
  return value;
}

function buildProviderConfig(env: Env): ProviderConfig {
  const kind = env.TRANSLATION_PROVIDER;
  if (kind === 'managed-api') {
    return {
      kind,
      accessKeyId: required(env.AWS_ACCESS_KEY_ID, 'AWS_ACCESS_KEY_ID', kind),
      secretAccessKey: required(env.AWS_SECRET_ACCESS_KEY, 'AWS_SECRET_ACCESS_KEY', kind),
      region: required(env.AWS_REGION, 'AWS_REGION', kind),
    };
  }
  return {
    kind,
    apiUrl: required(env.LLM_API_URL, 'LLM_API_URL', kind),
    model: required(env.LLM_MODEL, 'LLM_MODEL', kind),
    timeoutMs: env.LLM_TIMEOUT_MS,
    ...(env.LLM_API_KEY !== undefined && { apiKey: env.LLM_API_KEY }),
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Reads and validates the process configuration once. The result is frozen
 * and passed explicitly to everything that needs it.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    throw new ConfigurationError(issue ? issue.message : 'invalid configuration', field);
  }
  const env = parsed.data;

  return deepFreeze({
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    apiToken: env.API_TOKEN,
    chatServer: {
      url: env.CHAT_SERVER_URL.replace(/\/+$/, ''),
      token: env.CHAT_BOT_TOKEN,
    },
    bot: {
      username: env.BOT_USERNAME ?? DEFAULT_BOT_USERNAME,
      ...(env.BOT_ICON_URL !== undefined && { iconUrl: env.BOT_ICON_URL }),
    },
    provider: buildProviderConfig(env),
  });
}
