import { z } from 'zod';
import { createLogger } from './logger.js';
import { ConfigError } from './errors.js';

const logger = createLogger('config');

export const DEFAULT_BASE_URL = 'https://api.gagiteck.com/v1';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const ConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeoutMs: z.coerce.number().int().positive().default(30000),
  debug: booleanFlag,
  agent: z.object({
    defaultModel: z.string().min(1).default('claude-3-sonnet'),
    maxTurns: z.coerce.number().int().positive().default(10),
    maxTokens: z.coerce.number().int().positive().default(4096),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
  }),
  providers: z.object({
    openaiApiKey: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    grokApiKey: z.string().optional(),
  }),
  defaultLlmProvider: z.enum(['openai', 'anthropic', 'grok']).default('anthropic'),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Treat empty variables as unset so `FOO=` falls back to the default.
 */
function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function parseConfig(env: Env): Config {
  const rawConfig = {
    apiKey: read(env, 'GAGITECK_API_KEY'),
    baseUrl: read(env, 'GAGITECK_BASE_URL'),
    timeoutMs: read(env, 'GAGITECK_TIMEOUT_MS'),
    debug: read(env, 'GAGITECK_DEBUG'),
    agent: {
      defaultModel: read(env, 'AGENT_DEFAULT_MODEL'),
      maxTurns: read(env, 'AGENT_MAX_TURNS'),
      maxTokens: read(env, 'AGENT_MAX_TOKENS'),
      temperature: read(env, 'AGENT_TEMPERATURE'),
    },
    providers: {
      openaiApiKey: read(env, 'OPENAI_API_KEY'),
      anthropicApiKey: read(env, 'ANTHROPIC_API_KEY'),
      grokApiKey: read(env, 'GROK_API_KEY'),
    },
    defaultLlmProvider: read(env, 'DEFAULT_LLM_PROVIDER'),
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.error({ issues: parsed.error.issues }, 'Failed to load configuration');
    throw new ConfigError(`Configuration validation failed: ${details}`, parsed.error);
  }

  return parsed.data;
}

/**
 * Copy of the config that is safe to log
 */
export function redactConfig(config: Config): Record<string, unknown> {
  return {
    apiKey: config.apiKey ? '[REDACTED]' : undefined,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    debug: config.debug,
    agent: config.agent,
    providers: {
      openaiApiKey: config.providers.openaiApiKey ? '[REDACTED]' : undefined,
      anthropicApiKey: config.providers.anthropicApiKey ? '[REDACTED]' : undefined,
      grokApiKey: config.providers.grokApiKey ? '[REDACTED]' : undefined,
    },
    defaultLlmProvider: config.defaultLlmProvider,
  };
}

let config: Config | null = null;

export function loadConfig(): Config {
  if (config) {
    return config;
  }

  config = parseConfig(process.env);
  logger.debug({ config: redactConfig(config) }, 'Configuration loaded');
  return config;
}

export function getConfig(): Config {
  if (!config) {
    return loadConfig();
  }
  return config;
}

/**
 * Forget the cached config so the next `getConfig()` re-reads the environment.
 */
export function resetConfig(): void {
  config = null;
}
