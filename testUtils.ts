import type { AskOptions, ChatInstance } from './GenAI';

/**
 * Scripted backend for tests. Each call consumes the next reply; an Error
 * entry is thrown instead of returned. Once the script runs out every call
 * answers with `fallback`.
 */
export class FakeChat implements ChatInstance {
  readonly label = 'fake:test';
  readonly prompts: string[] = [];
  readonly options: AskOptions[] = [];

  constructor(
    private readonly replies: Array<string | Error> = [],
    private readonly fallback = '```\nrewritten()\n```',
  ) {}

  async ask(prompt: string, options: AskOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const reply = this.replies.shift() ?? this.fallback;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

// Backend whose requests never complete, for exercising timeouts.
export class SilentChat implements ChatInstance {
  readonly label = 'silent:test';
  readonly options: AskOptions[] = [];
  calls = 0;

  ask(_prompt: string, options: AskOptions): Promise<string> {
    this.calls++;
    this.options.push(options);
    return new Promise<string>(() => {});
  }
}

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected the promise to reject');
}
