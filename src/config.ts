import 'dotenv/config';
import { createLogger } from './utils/logger.js';

const logger = createLogger('config');

type Env = Record<string, string | undefined>;

export type AIProvider = 'anthropic' | 'gemini';

const AI_PROVIDERS: readonly AIProvider[] = ['anthropic', 'gemini'];

const DEFAULT_MODELS: Record<AIProvider, string> = {
  anthropic: 'claude-sonnet-4-5',
  gemini: 'gemini-2.5-flash',
};

export interface AIConfig {
  provider: AIProvider;
  model: string;
  maxTokens: number;
  apiKeys: {
    anthropic: string;
    googleAi: string;
  };
}

export interface AppConfig {
  database: {
    url: string;
  };
  auth: {
    apiKey: string;
  };
  content: {
    baseUrl: string;
  };
  ai: AIConfig;
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
}

function readString(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function readInt(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

function readProvider(env: Env): AIProvider {
  const value = (env.PROFILE_AI_PROVIDER ?? 'anthropic').toLowerCase();
  const provider = AI_PROVIDERS.find((p) => p === value);
  if (!provider) {
    throw new Error(`PROFILE_AI_PROVIDER must be one of ${AI_PROVIDERS.join(', ')}, got: ${value}`);
  }
  return provider;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = readProvider(env);

  return Object.freeze({
    database: {
      url: readString(env, 'DATABASE_URL', './data/profiles.db'),
    },

    auth: {
      apiKey: readString(env, 'API_KEY', ''),
    },

    content: {
      baseUrl: readString(env, 'QUERY_API_URL', 'http://localhost:5001').replace(/\/+$/, ''),
    },

    ai: {
      provider,
      model: env.PROFILE_AI_MODEL || DEFAULT_MODELS[provider],
      maxTokens: readInt(env, 'PROFILE_AI_MAX_TOKENS', 4096),
      apiKeys: {
        anthropic: readString(env, 'ANTHROPIC_API_KEY', ''),
        googleAi: readString(env, 'GOOGLE_AI_API_KEY', ''),
      },
    },

    server: {
      port: readInt(env, 'PORT', 5000),
      host: readString(env, 'HOST', '0.0.0.0'),
      nodeEnv: readString(env, 'NODE_ENV', 'development'),
    },
  });
}

export function validateConfig(config: AppConfig): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  const providerKey = config.ai.provider === 'anthropic'
    ? { name: 'ANTHROPIC_API_KEY', value: config.ai.apiKeys.anthropic }
    : { name: 'GOOGLE_AI_API_KEY', value: config.ai.apiKeys.googleAi };

  if (!config.auth.apiKey) {
    warnings.push('API_KEY is not set; every request will be rejected');
  }
  if (!providerKey.value) {
    warnings.push(`${providerKey.name} is not set; AI profile generation will fail`);
  }

  if (config.server.nodeEnv === 'production') {
    if (!config.auth.apiKey) {
      errors.push('API_KEY is required in production');
    }
    if (!providerKey.value) {
      errors.push(`${providerKey.name} is required in production`);
    }
    if (config.content.baseUrl.includes('localhost')) {
      errors.push('QUERY_API_URL must point at the content service in production');
    }
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }
}
