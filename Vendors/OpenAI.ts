import OpenAI from "openai";
import { BackendError, toBackendError } from "../Errors";
import type { AskOptions, ChatInstance, Provider } from "../GenAI";

// Serves OpenAI itself plus every server speaking its chat API (xAI, llama.cpp).
export class OpenAIChat implements ChatInstance {
  readonly client: OpenAI;
  private readonly model: string;
  private readonly provider: Provider;
  readonly label: string;

  constructor(apiKey: string, baseURL: string, model: string, provider: Provider) {
    // Retries belong to the pipeline, which knows which failures are transient.
    this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
    this.model = model;
    this.provider = provider;
    this.label = `${provider}:${model}`;
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    try {
      if (this.provider === "openai") {
        return await this.askViaResponsesAPI(prompt, options);
      }
      return await this.askViaChatCompletions(prompt, options);
    } catch (err) {
      throw toBackendError(this.label, err);
    }
  }

  // Ids of the models the server offers; llama.cpp reports the path it loaded.
  async listModels(): Promise<string[]> {
    try {
      const page = await this.client.models.list();
      return page.data.map(model => model.id);
    } catch (err) {
      throw toBackendError(this.label, err);
    }
  }

  private async askViaResponsesAPI(prompt: string, options: AskOptions): Promise<string> {
    const response = await this.client.responses.create(
      {
        model: this.model,
        input: prompt,
        instructions: options.system,
        temperature: options.temperature,
        max_output_tokens: options.max_tokens,
      },
      { signal: options.signal },
    );
    if (response.error) {
      throw new BackendError(`${this.label}: ${response.error.message}`, "response", this.label);
    }
    return response.output_text;
  }

  private async askViaChatCompletions(prompt: string, options: AskOptions): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      ...(options.system ? [{ role: "system" as const, content: options.system }] : []),
      { role: "user", content: prompt },
    ];

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: options.temperature,
        max_tokens: options.max_tokens,
      },
      { signal: options.signal },
    );

    const choice = completion.choices?.[0];
    if (!choice) {
      throw new BackendError(`${this.label}: reply carried no choices`, "response", this.label);
    }
    return choice.message.content ?? "";
  }
}
