import { z } from 'zod';

export function sanitizeEnvValue(value?: string | null): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.trim() || undefined;
}

/** Keys and ids never contain whitespace, so all of it goes. */
function sanitizeSecret(value?: string | null): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.replace(/\s+/g, '').trim() || undefined;
}

const integer = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  PORT: integer(8000, 1, 65535),
  NODE_ENV: z.string().default('development'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o'),
  OPENAI_MAX_TOKENS: integer(4096, 1, 128000),
  OPENAI_MAX_RETRIES: integer(0, 0, 10),
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  FIREBASE_PRIVATE_KEY: z.string().optional(),
  HISTORY_STORE: z.enum(['firestore', 'memory']).default('firestore'),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000,http://localhost:8080'),
});

export interface FirebaseCredentials {
  projectId: string;
  clientEmail: string;
  privateKey: string;
}

export interface AppConfig {
  port: number;
  environment: string;
  version: string;
  openai: {
    apiKey: string | undefined;
    baseURL: string | undefined;
    model: string;
    maxTokens: number;
    maxRetries: number;
  };
  /** Undefined when the service account is not fully configured. */
  firebase: FirebaseCredentials | undefined;
  firebaseProjectId: string | undefined;
  historyStore: 'firestore' | 'memory';
  allowedOrigins: string[];
}

export const API_VERSION = '1.0.0';

export class ConfigError extends Error {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads configuration from an environment map. Empty and whitespace-only
 * values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    cleaned[key] = key === 'OPENAI_API_KEY' ? sanitizeSecret(env[key]) : sanitizeEnvValue(env[key]);
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const parsed = result.data;

  // Private keys pasted into .env files usually carry literal "\n" sequences.
  const privateKey = parsed.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, '\n');
  const firebase =
    parsed.FIREBASE_PROJECT_ID && parsed.FIREBASE_CLIENT_EMAIL && privateKey
      ? {
          projectId: parsed.FIREBASE_PROJECT_ID,
          clientEmail: parsed.FIREBASE_CLIENT_EMAIL,
          privateKey,
        }
      : undefined;

  return {
    port: parsed.PORT,
    environment: parsed.NODE_ENV,
    version: API_VERSION,
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      baseURL: parsed.OPENAI_BASE_URL,
      model: parsed.OPENAI_MODEL,
      maxTokens: parsed.OPENAI_MAX_TOKENS,
      maxRetries: parsed.OPENAI_MAX_RETRIES,
    },
    firebase,
    firebaseProjectId: parsed.FIREBASE_PROJECT_ID,
    historyStore: parsed.HISTORY_STORE,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
