import Anthropic from "@anthropic-ai/sdk";
import { BackendError, toBackendError } from "../Errors";
import type { AskOptions, ChatInstance } from "../GenAI";

const DEFAULT_MAX_TOKENS = 8192;

export class AnthropicChat implements ChatInstance {
  readonly client: Anthropic;
  private readonly model: string;
  readonly label: string;

  constructor(apiKey: string, model: string) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
    this.model = model;
    this.label = `anthropic:${model}`;
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: options.max_tokens ?? DEFAULT_MAX_TOKENS,
          system: options.system,
          temperature: options.temperature,
          messages: [{ role: "user", content: prompt }],
        },
        { signal: options.signal },
      );
    } catch (err) {
      throw toBackendError(this.label, err);
    }

    let plain = "";
    let sawText = false;
    for (const block of message.content) {
      if (block.type === "text") {
        plain += block.text;
        sawText = true;
      }
    }
    if (!sawText) {
      throw new BackendError(`${this.label}: reply carried no text block`, "response", this.label);
    }
    return plain;
  }
}
