import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError, errorMessage } from './Errors';
import { type Credentials, MODELS, type Provider, PROVIDERS } from './GenAI';

export type JoinMode = 'fresh' | 'concat';

const JOIN_MODES: readonly JoinMode[] = ['fresh', 'concat'];

export const DEFAULT_WINDOW_SIZE = 4096;
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 1000;

// Largest delay setTimeout honors; anything above fires at once.
export const MAX_TIMEOUT_MS = 2_147_483_647;

// Headroom for a reply slightly longer than its window, as the local runtime needs.
const OUTPUT_TOKEN_MARGIN = 500;

export interface DebloatConfig {
  provider: Provider;
  model: string;
  windowSize: number;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  joinMode: JoinMode;
}

// Raw option values, as the CLI hands them over.
export interface ConfigInput {
  provider?: string;
  model?: string;
  windowSize?: string;
  temperature?: string;
  maxOutputTokens?: string;
  timeout?: string;
  retries?: string;
  join?: string;
}

const API_KEY_VARS: Record<Exclude<Provider, 'local'>, string> = {
  openai    : 'OPENAI_API_KEY',
  anthropic : 'ANTHROPIC_API_KEY',
  google    : 'GEMINI_API_KEY',
  xai       : 'XAI_API_KEY',
};

// Accepts either the provider's index in PROVIDERS or its name.
export function resolveProvider(selector: string): Provider {
  const trimmed = selector.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) {
    const provider = PROVIDERS[Number(trimmed)];
    if (provider) {
      return provider;
    }
  } else {
    const provider = PROVIDERS.find(p => p === trimmed);
    if (provider) {
      return provider;
    }
  }
  const choices = PROVIDERS.map((p, i) => `${i}=${p}`).join(', ');
  throw new ConfigurationError(`Unknown provider "${selector}", expected one of ${choices}`);
}

function parseInteger(
  raw: string | undefined,
  fallback: number,
  flag: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value < min || value > max) {
    throw new ConfigurationError(`Invalid ${flag} value: ${raw}`);
  }
  return value;
}

/**
 * Validates raw options into a complete configuration. Runs before the target
 * file is read, so a bad flag never costs a backend call.
 */
export function loadConfig(input: ConfigInput): DebloatConfig {
  const provider = resolveProvider(input.provider ?? '0');
  const model = (input.model ?? '').trim() || MODELS[provider];

  const windowSize = parseInteger(input.windowSize, DEFAULT_WINDOW_SIZE, '--window-size', 1);
  if (Math.floor(windowSize / 2) === 0) {
    throw new ConfigurationError(`Invalid --window-size value: ${windowSize} gives a zero stride`);
  }

  let temperature = DEFAULT_TEMPERATURE;
  if (input.temperature !== undefined) {
    temperature = Number(input.temperature);
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
      throw new ConfigurationError(`Invalid --temperature value: ${input.temperature}`);
    }
  }

  const maxOutputTokens = parseInteger(
    input.maxOutputTokens,
    windowSize + OUTPUT_TOKEN_MARGIN,
    '--max-output-tokens',
    1,
  );
  const timeoutMs = parseInteger(input.timeout, DEFAULT_TIMEOUT_MS, '--timeout', 1, MAX_TIMEOUT_MS);
  const maxRetries = parseInteger(input.retries, DEFAULT_RETRIES, '--retries', 0);

  const join = (input.join ?? 'fresh').trim().toLowerCase();
  const joinMode = JOIN_MODES.find(mode => mode === join);
  if (!joinMode) {
    throw new ConfigurationError(`Invalid --join mode: ${input.join}, expected fresh or concat`);
  }

  return {
    provider,
    model,
    windowSize,
    temperature,
    maxOutputTokens,
    timeoutMs,
    maxRetries,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    joinMode,
  };
}

async function readToken(vendor: string, home: string): Promise<string | undefined> {
  const tokenPath = path.join(home, '.config', `${vendor}.token`);
  try {
    return (await fs.readFile(tokenPath, 'utf8')).trim() || undefined;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigurationError(`Error reading ${tokenPath}: ${errorMessage(err)}`);
  }
}

/**
 * Gathers what the chosen backend needs from the process environment, once,
 * at startup. API keys come from the environment (a `.env` file included) or
 * from `~/.config/<vendor>.token`.
 */
export async function loadCredentials(
  provider: Provider,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): Promise<Credentials> {
  if (provider === 'local') {
    return {
      baseURL: env.DEBLOAT_LOCAL_BASE_URL || undefined,
      cacheDir: env.DEBLOAT_CACHE_DIR || path.join(home, '.cache', 'debloat'),
    };
  }

  const variable = API_KEY_VARS[provider];
  const apiKey = env[variable]?.trim() || await readToken(provider, home);
  if (!apiKey) {
    throw new ConfigurationError(
      `Missing credentials for ${provider}: set ${variable} or write ~/.config/${provider}.token`,
    );
  }
  return { apiKey };
}
