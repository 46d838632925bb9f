import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const PROJECT_ROOT = join(__dirname, '../../..');

export interface ServerConfig {
  port: number;
  databasePath: string;
  isProduction: boolean;
  classifier: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
}

const DEFAULT_PORT = 8005;
const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const DEFAULT_CLASSIFY_TIMEOUT_MS = 8000;

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const apiKey = env.ANTHROPIC_API_KEY?.trim();
  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    databasePath: env.DATABASE_PATH || join(PROJECT_ROOT, 'data/tickets.sqlite'),
    isProduction: env.NODE_ENV === 'production',
    classifier: {
      apiKey: apiKey || undefined,
      model: env.CLASSIFY_MODEL?.trim() || DEFAULT_MODEL,
      timeoutMs: positiveInt(env.CLASSIFY_TIMEOUT_MS, DEFAULT_CLASSIFY_TIMEOUT_MS),
    },
  };
}
