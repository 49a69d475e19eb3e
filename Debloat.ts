#!/usr/bin/env node

import * as readline from 'readline';
import { Command, CommanderError } from 'commander';
import * as dotenv from 'dotenv';
import { type DebloatConfig, loadConfig, loadCredentials } from './Config';
import { type DebloatPreview, runDebloat } from './DebloatPipeline';
import { GenAI, PROVIDERS, type ChatInstance } from './GenAI';
import { formatError, formatReport } from './Report';

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

interface CliOptions {
  provider: string;
  model?: string;
  windowSize: string;
  temperature: string;
  maxOutputTokens?: string;
  timeout: string;
  retries: string;
  join: string;
  yes?: boolean;
}

export interface CliDeps {
  createBackend: (config: DebloatConfig, log: (message: string) => void) => Promise<ChatInstance>;
  confirm: (preview: DebloatPreview) => Promise<boolean>;
}

function logStep(message: string): void {
  console.log(`[debloat] ${message}`);
}

function logDetail(message: string): void {
  console.log(`${DIM}[debloat] ${message}${RESET}`);
}

async function createBackend(config: DebloatConfig, log: (message: string) => void): Promise<ChatInstance> {
  dotenv.config();
  const credentials = await loadCredentials(config.provider);
  return GenAI({ provider: config.provider, model: config.model }, credentials, log);
}

async function askToProceed(preview: DebloatPreview): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return true;
  }
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const answer = await new Promise<string>(resolve => {
    rl.question(
      `\x1b[31mOverwrite ${preview.filePath} (${preview.originalLoc} -> ${preview.newLoc} LOC)? [y/N] \x1b[0m`,
      resolve,
    );
  });
  rl.close();
  return answer.trim().toLowerCase() === 'y';
}

const DEFAULT_DEPS: CliDeps = { createBackend, confirm: askToProceed };

function buildProgram(): Command {
  const providers = PROVIDERS.map((p, i) => `${i}=${p}`).join(', ');
  return new Command()
    .name('debloat')
    .description('Shrink a source file by having a language model rewrite it, keeping a .bak copy.')
    .argument('<file>', 'File to debloat in place')
    .option('-p, --provider <id>', `Backend, by index or name (${providers})`, '0')
    .option('-m, --model <name>', 'Model name (defaults per provider)')
    .option('-w, --window-size <chars>', 'Characters per chunk', '4096')
    .option('-t, --temperature <num>', 'Sampling temperature', '0.1')
    .option('--max-output-tokens <num>', 'Reply token cap per chunk (default: window size + 500)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', '120000')
    .option('--retries <num>', 'Retries for transient backend failures', '2')
    .option('--join <mode>', 'Overlap handling: fresh or concat', 'fresh')
    .option('-y, --yes', 'Overwrite without asking')
    .addHelpText('after', [
      '',
      'Examples:',
      '  debloat app.py',
      '  debloat src/server.ts --provider openai',
      '  debloat main.go -p 2 -w 8192 --yes',
    ].join('\n'))
    .exitOverride();
}

/**
 * Runs the command line and returns the process exit code.
 */
export async function main(argv: string[], deps: CliDeps = DEFAULT_DEPS): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const [file] = program.args;
  const opts = program.opts<CliOptions>();

  try {
    const config = loadConfig({
      provider: opts.provider,
      model: opts.model,
      windowSize: opts.windowSize,
      temperature: opts.temperature,
      maxOutputTokens: opts.maxOutputTokens,
      timeout: opts.timeout,
      retries: opts.retries,
      join: opts.join,
    });
    logStep(`model: ${config.provider}:${config.model}`);

    const backend = await deps.createBackend(config, logDetail);
    const result = await runDebloat(file, backend, {
      windowSize: config.windowSize,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      joinMode: config.joinMode,
      confirm: opts.yes ? undefined : deps.confirm,
      log: logDetail,
    });

    if (!result.applied) {
      logStep('Aborted, file left untouched.');
      return 0;
    }
    console.log(`\n${formatReport(result)}`);
    return 0;
  } catch (err) {
    console.error(formatError(err));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv).then(
    code => {
      process.exitCode = code;
    },
    err => {
      console.error(formatError(err));
      process.exitCode = 1;
    },
  );
}
