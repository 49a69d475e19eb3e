import * as fs from 'fs/promises';
import * as path from 'path';
import { type ChunkView, planChunks, splitOverlap, strideFor } from './ChunkPlanner';
import type { JoinMode } from './Config';
import { BackendError, errorMessage, FileError, toBackendError } from './Errors';
import { type AskOptions, type ChatInstance, tokenCount } from './GenAI';
import { countSignificantLines } from './LineCounter';
import { extractCode } from './ResponseExtractor';

export const SYSTEM = [
  'You are a code refactoring assistant.',
  'You shorten code without changing what it does.',
  'You answer with exactly one fenced code block and nothing else.',
].join(' ');

const LANGUAGES: Record<string, string> = {
  '.py'    : 'Python',
  '.js'    : 'JavaScript',
  '.mjs'   : 'JavaScript',
  '.cjs'   : 'JavaScript',
  '.jsx'   : 'JavaScript',
  '.ts'    : 'TypeScript',
  '.tsx'   : 'TypeScript',
  '.java'  : 'Java',
  '.kt'    : 'Kotlin',
  '.go'    : 'Go',
  '.rs'    : 'Rust',
  '.rb'    : 'Ruby',
  '.php'   : 'PHP',
  '.c'     : 'C',
  '.h'     : 'C',
  '.cpp'   : 'C++',
  '.hpp'   : 'C++',
  '.cs'    : 'C#',
  '.swift' : 'Swift',
  '.sh'    : 'shell',
};

export interface ProcessedChunk {
  index: number;
  code: string;
  skipped: boolean;
}

export interface DebloatResult {
  originalLoc: number;
  newLoc: number;
  reductionPct: number;
  backupPath: string;
  chunkCount: number;
  requestCount: number;
  applied: boolean;
}

export interface DebloatPreview {
  filePath: string;
  originalLoc: number;
  newLoc: number;
  reductionPct: number;
}

export interface DebloatOptions {
  windowSize: number;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  joinMode?: JoinMode;
  // Called after every chunk succeeded and before anything is written.
  confirm?: (preview: DebloatPreview) => Promise<boolean>;
  log?: (message: string) => void;
}

export interface PromptOptions {
  language?: string;
  context?: string;
}

export function languageOf(filePath: string): string | undefined {
  return LANGUAGES[path.extname(filePath).toLowerCase()];
}

export function buildPrompt(chunkText: string, options: PromptOptions = {}): string {
  const language = options.language ?? 'the same language as the original';
  const lines = [
    'Refactor this code to remove bloat while maintaining functionality.',
    `Keep it in ${language}. Do not add explanations, comments about your changes, or analysis.`,
    'Return ONLY the cleaned code wrapped in a single ``` fenced block.',
    '',
  ];
  if (options.context) {
    lines.push(
      'The code below directly follows the original code shown here, which is for context only.',
      'Do NOT repeat the context in your answer.',
      '',
      'Context:',
      options.context,
      '',
    );
  }
  lines.push('Original code:', chunkText, '', 'Cleaned code:');
  return lines.join('\n');
}

export function reductionPct(originalLoc: number, newLoc: number): number {
  if (originalLoc === 0) {
    return 0;
  }
  return ((originalLoc - newLoc) * 100) / originalLoc;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Asks the backend once, giving up after `timeoutMs`. The abort signal lets
 * the SDK drop the request; the race covers backends that ignore it.
 */
export async function askWithTimeout(
  backend: ChatInstance,
  prompt: string,
  options: AskOptions,
  timeoutMs: number,
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new BackendError(`${backend.label}: no reply within ${timeoutMs} ms`, 'timeout', backend.label));
    }, timeoutMs);
  });
  try {
    return await Promise.race([backend.ask(prompt, { ...options, signal: controller.signal }), expiry]);
  } catch (err) {
    throw toBackendError(backend.label, err);
  } finally {
    clearTimeout(timer);
  }
}

async function askWithRetry(
  backend: ChatInstance,
  prompt: string,
  askOptions: AskOptions,
  options: Required<Pick<DebloatOptions, 'timeoutMs' | 'maxRetries' | 'retryDelayMs'>>,
  log: (message: string) => void,
): Promise<string> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await askWithTimeout(backend, prompt, askOptions, options.timeoutMs);
    } catch (err) {
      const error = toBackendError(backend.label, err);
      if (!error.transient || attempt >= options.maxRetries) {
        throw error;
      }
      const delay = options.retryDelayMs * 2 ** attempt;
      log(`${error.kind} failure, retrying in ${delay} ms (${attempt + 1}/${options.maxRetries})`);
      await sleep(delay);
    }
  }
}

async function readSource(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new FileError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath);
  }
}

async function writeFile(filePath: string, data: string | Buffer, what: string): Promise<void> {
  try {
    await fs.writeFile(filePath, data);
  } catch (err) {
    throw new FileError(`Cannot write ${what} ${filePath}: ${errorMessage(err)}`, filePath);
  }
}

function joinChunks(processed: ProcessedChunk[], source: string): string {
  const joined = processed
    .filter(chunk => !chunk.skipped)
    .map(chunk => chunk.code)
    .join('\n');
  if (source.endsWith('\n') && joined && !joined.endsWith('\n')) {
    return `${joined}\n`;
  }
  return joined;
}

/**
 * Rewrites `filePath` through the backend, one window at a time.
 *
 * Nothing is written until every window has been rewritten. The original
 * bytes then go to `<filePath>.bak`, and only once that write has completed
 * is the target overwritten.
 */
export async function runDebloat(
  filePath: string,
  backend: ChatInstance,
  options: DebloatOptions,
): Promise<DebloatResult> {
  // A bad window size is a configuration error, raised before any file I/O.
  strideFor(options.windowSize);
  const log = options.log ?? (() => {});
  const joinMode = options.joinMode ?? 'fresh';
  const retry = {
    timeoutMs: options.timeoutMs ?? 120_000,
    maxRetries: options.maxRetries ?? 0,
    retryDelayMs: options.retryDelayMs ?? 1000,
  };
  const askOptions: AskOptions = {
    system: SYSTEM,
    temperature: options.temperature,
    max_tokens: options.maxOutputTokens,
  };

  const original = await readSource(filePath);
  const text = original.toString('utf8');
  const originalLoc = countSignificantLines(text);
  const language = languageOf(filePath);

  const chunks = planChunks(text, options.windowSize);
  const views: ChunkView[] = joinMode === 'fresh'
    ? splitOverlap(chunks)
    : chunks.map(chunk => ({ chunk, context: '', fresh: chunk.text }));
  log(`${chunks.length} chunk(s) of up to ${options.windowSize} chars`);

  const processed: ProcessedChunk[] = [];
  let requestCount = 0;
  for (const view of views) {
    const { index } = view.chunk;
    const label = `chunk ${index + 1}/${chunks.length}`;
    if (!view.fresh) {
      log(`${label}: already covered, skipped`);
      processed.push({ index, code: '', skipped: true });
      continue;
    }

    const tokens = tokenCount(view.fresh);
    log(`${label}: ${view.fresh.length} chars, ${tokens} tokens`);
    if (options.maxOutputTokens !== undefined && tokens > options.maxOutputTokens) {
      log(`${label}: exceeds the ${options.maxOutputTokens} token output cap, reply may be cut off`);
    }

    const prompt = buildPrompt(view.fresh, { language, context: view.context });
    requestCount++;
    const reply = await askWithRetry(backend, prompt, askOptions, retry, log);
    processed.push({ index, code: extractCode(reply), skipped: false });
  }

  const newText = joinChunks(processed, text);
  const newLoc = countSignificantLines(newText);
  const pct = reductionPct(originalLoc, newLoc);
  const backupPath = `${filePath}.bak`;
  const result: DebloatResult = {
    originalLoc,
    newLoc,
    reductionPct: pct,
    backupPath,
    chunkCount: chunks.length,
    requestCount,
    applied: false,
  };

  if (options.confirm) {
    const proceed = await options.confirm({ filePath, originalLoc, newLoc, reductionPct: pct });
    if (!proceed) {
      return result;
    }
  }

  await writeFile(backupPath, original, 'backup');
  await writeFile(filePath, newText, 'target');
  return { ...result, applied: true };
}
