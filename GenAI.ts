import * as path from 'path';
import { encode } from 'gpt-tokenizer';
import { ConfigurationError, errorMessage } from './Errors';
import { AnthropicChat } from './Vendors/Anthropic';
import { GoogleChat } from './Vendors/Google';
import { ensureWeights, type Fetcher, LOCAL_WEIGHTS } from './Vendors/LocalWeights';
import { OpenAIChat } from './Vendors/OpenAI';

export type Provider = 'local' | 'openai' | 'anthropic' | 'google' | 'xai';

// Order is the CLI's numeric provider selector.
export const PROVIDERS: readonly Provider[] = ['local', 'openai', 'anthropic', 'google', 'xai'];

export const MODELS: Record<Provider, string> = {
  local     : LOCAL_WEIGHTS.file,
  openai    : 'gpt-4o',
  anthropic : 'claude-sonnet-4-5-20250929',
  google    : 'gemini-2.5-pro',
  xai       : 'grok-4-0709',
};

export const DEFAULT_LOCAL_BASE_URL = 'http://127.0.0.1:8080/v1';

export interface AskOptions {
  system?: string;
  temperature?: number;
  max_tokens?: number;
  signal?: AbortSignal;
}

export interface ChatInstance {
  readonly label: string;
  ask(prompt: string, options: AskOptions): Promise<string>;
}

export interface Credentials {
  apiKey?: string;
  baseURL?: string;
  cacheDir?: string;
}

export interface BackendSettings {
  provider: Provider;
  model: string;
}

// llama.cpp's server accepts any bearer token.
const LOCAL_API_KEY = 'sk-no-key-required';

/**
 * Connects to the local OpenAI-compatible server. For the default model the
 * server must already be serving the default weights; when it is not, the
 * weights are fetched into the cache and the run stops with the command that
 * starts a server on them.
 */
async function localChat(
  model: string,
  credentials: Credentials,
  log: (message: string) => void,
  fetcher: Fetcher,
): Promise<ChatInstance> {
  const baseURL = credentials.baseURL ?? DEFAULT_LOCAL_BASE_URL;
  const chat = new OpenAIChat(LOCAL_API_KEY, baseURL, path.basename(model), 'local');
  // Other models are whatever the local server was started with.
  if (model !== LOCAL_WEIGHTS.file) {
    return chat;
  }

  let served: string[] = [];
  try {
    served = await chat.listModels();
  } catch (err) {
    log(`local server unavailable: ${errorMessage(err)}`);
  }
  if (served.some(id => path.basename(id) === LOCAL_WEIGHTS.file)) {
    return chat;
  }

  if (!credentials.cacheDir) {
    throw new ConfigurationError('The local provider needs a model cache directory');
  }
  const weights = await ensureWeights(credentials.cacheDir, LOCAL_WEIGHTS, fetcher, log);
  const port = new URL(baseURL).port || '8080';
  throw new ConfigurationError(
    `No server at ${baseURL} is serving ${LOCAL_WEIGHTS.file}. Start one with: llama-server -m ${weights} --port ${port}`,
  );
}

export async function GenAI(
  settings: BackendSettings,
  credentials: Credentials,
  log: (message: string) => void = () => {},
  fetcher: Fetcher = fetch,
): Promise<ChatInstance> {
  const { provider, model } = settings;

  if (provider === 'local') {
    return localChat(model, credentials, log, fetcher);
  }

  const apiKey = credentials.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(`No credentials for provider "${provider}"`);
  }

  if (provider === 'openai' || provider === 'xai') {
    const baseURL = provider === 'openai'
      ? 'https://api.openai.com/v1'
      : 'https://api.x.ai/v1';
    return new OpenAIChat(apiKey, baseURL, model, provider);
  }

  if (provider === 'anthropic') {
    return new AnthropicChat(apiKey, model);
  }

  return new GoogleChat(apiKey, model);
}

// Source files may legitimately contain strings like "<|endoftext|>".
export function tokenCount(text: string): number {
  return encode(text, { allowedSpecial: 'all' }).length;
}
