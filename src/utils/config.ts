import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { isAIMode, type AIMode } from '../agent/router/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = join(__dirname, '..', '..');

/**
 * Loads KEY=value pairs from <root>/.env. Variables already present in the
 * environment win.
 */
function loadEnvFile(): void {
  const envPath = join(projectRoot, '.env');

  if (!existsSync(envPath)) {
    return;
  }

  const content = readFileSync(envPath, 'utf-8');

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim();

    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

loadEnvFile();

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function getIntEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function getDefaultMode(): AIMode {
  const raw = process.env.ASSISTANT_DEFAULT_MODE;
  return raw && isAIMode(raw) ? raw : 'hybrid';
}

const dataDir = process.env.CARE_DATA_DIR || join(projectRoot, 'data');
const cloudBaseUrl = process.env.CLOUD_API_BASE || 'https://api.openai.com/v1';

export const config = {
  cloud: {
    apiKey: getEnvVar('CLOUD_API_KEY'),
    baseUrl: cloudBaseUrl,
    model: process.env.CLOUD_MODEL || 'gpt-4o-mini',
    /** Upper bound for one cloud answer, retries included */
    timeoutMs: getIntEnv('CLOUD_TIMEOUT_MS', 30_000),
  },
  ollama: {
    enabled: process.env.ONDEVICE_MODEL_ENABLED === 'true',
    url: process.env.OLLAMA_URL || 'http://localhost:11434',
    model: process.env.OLLAMA_MODEL || 'qwen2.5:3b-instruct',
  },
  connectivity: {
    probeUrl: process.env.CONNECTIVITY_PROBE_URL || cloudBaseUrl,
    intervalMs: getIntEnv('CONNECTIVITY_INTERVAL_MS', 30_000),
  },
  assistant: {
    /** Used when the profile has no preferred mode */
    defaultMode: getDefaultMode(),
  },
  paths: {
    root: projectRoot,
    data: dataDir,
    database: join(dataDir, 'care.db'),
  },
  timezone: process.env.CARE_TIMEZONE || 'America/Mexico_City',
  seedDemoProfile: process.env.SEED_DEMO_PROFILE !== 'false',
} as const;

export function validateConfig(): string[] {
  const warnings: string[] = [];

  if (!config.cloud.apiKey) {
    warnings.push('CLOUD_API_KEY not set. Cloud answers will fall back to on-device.');
  }

  const rawMode = process.env.ASSISTANT_DEFAULT_MODE;
  if (rawMode && !isAIMode(rawMode)) {
    warnings.push(`ASSISTANT_DEFAULT_MODE "${rawMode}" is not valid, using hybrid.`);
  }

  return warnings;
}
