import { GoogleGenAI } from "@google/genai";
import { BackendError, toBackendError } from "../Errors";
import type { AskOptions, ChatInstance } from "../GenAI";

export class GoogleChat implements ChatInstance {
  readonly client: GoogleGenAI;
  private readonly modelName: string;
  readonly label: string;

  constructor(apiKey: string, modelName: string) {
    this.client = new GoogleGenAI({ apiKey });
    this.modelName = modelName;
    this.label = `google:${modelName}`;
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    let visible: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.modelName,
        contents: prompt,
        config: {
          systemInstruction: options.system,
          temperature: options.temperature,
          maxOutputTokens: options.max_tokens,
          abortSignal: options.signal,
        },
      });
      visible = response.text;
    } catch (err) {
      throw toBackendError(this.label, err);
    }

    if (visible === undefined) {
      throw new BackendError(`${this.label}: reply carried no text candidate`, "response", this.label);
    }
    return visible;
  }
}
