import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  host: optional('HOST', '0.0.0.0'),
  port: optionalInt('PORT', 8000),
  logLevel: optional('LOG_LEVEL', process.env.NODE_ENV === 'test' ? 'silent' : 'info'),

  // ───── Prompt persistence ─────
  storage: {
    dataDir: path.resolve(projectRoot, optional('DATA_DIR', 'data')),
    promptFile: 'prompt.json',
  },

  // ───── LLM fallback stage ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4.1-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },
} as const;
