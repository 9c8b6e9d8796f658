import path from 'path';

export interface AppConfig {
  port: number;
  host: string;
  openaiApiKey?: string;
  openaiModel: string;
  llmTimeoutMs: number;
  llmMaxTokens: number;
  documentsDir: string;
  usersFile: string;
  sessionIdleMinutes: number;
  sessionMaxHours: number;
  payloadCeilingBytes: number;
  maxMatches: number;
  historyTurns: number;
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${key}="${raw}": expected a positive integer`);
  }
  return value;
}

/**
 * Reads configuration from the environment (after dotenv has populated it).
 * Relative paths resolve against the working directory.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: positiveInt(env, 'PORT', 3001),
    host: env.HOST || '0.0.0.0',
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    openaiModel: env.OPENAI_MODEL || 'gpt-4o-mini',
    llmTimeoutMs: positiveInt(env, 'LLM_TIMEOUT_MS', 30000),
    llmMaxTokens: positiveInt(env, 'LLM_MAX_TOKENS', 1000),
    documentsDir: path.resolve(env.DOCUMENTS_DIR || './documents'),
    usersFile: path.resolve(env.USERS_FILE || './data/users.json'),
    sessionIdleMinutes: positiveInt(env, 'SESSION_IDLE_MINUTES', 60),
    sessionMaxHours: positiveInt(env, 'SESSION_MAX_HOURS', 24),
    payloadCeilingBytes: positiveInt(env, 'PAYLOAD_CEILING_BYTES', 120000),
    maxMatches: positiveInt(env, 'MAX_MATCHES', 3),
    historyTurns: positiveInt(env, 'HISTORY_TURNS', 10),
    nodeEnv: env.NODE_ENV || 'production'
  };
}
