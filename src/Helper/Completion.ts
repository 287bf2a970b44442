import OpenAI from "openai";
import type { AppConfig } from "./Config";
import { BotError } from "./Errors";

export const SYSTEM_PROMPT =
  "You are a helpful assistant chatting with a user on Telegram. Answer clearly and concisely.";

type Fetch = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface CompletionOptions {
  apiKey: string;
  model: string;
  baseURL: string;
  timeoutMs: number;
  maxPromptChars: number;
  siteUrl?: string;
  appName?: string;
  // replaces the network call, used by tests
  fetch?: Fetch;
}

export class CompletionService {
  private readonly client: OpenAI;

  constructor(private readonly options: CompletionOptions) {
    const headers: Record<string, string> = {};
    if (options.siteUrl) headers["HTTP-Referer"] = options.siteUrl;
    if (options.appName) headers["X-Title"] = options.appName;

    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
      defaultHeaders: headers,
      fetch: options.fetch,
    });
  }

  static fromConfig(config: AppConfig["openRouter"], fetch?: Fetch): CompletionService {
    return new CompletionService({ ...config, fetch });
  }

  get maxPromptChars(): number {
    return this.options.maxPromptChars;
  }

  async complete(prompt: string): Promise<string> {
    const text = prompt.trim();

    if (text.length > this.options.maxPromptChars) {
      throw new BotError(
        "PayloadTooLarge",
        `your message has ${text.length} characters, the limit is ${this.options.maxPromptChars}.`
      );
    }

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: text },
        ],
        temperature: 0.7,
        max_tokens: 800,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      console.error("OpenRouter request failed:", error);
      throw new BotError("UpstreamUnavailable", "completion request failed", {
        cause: error,
      });
    }

    const reply = content?.trim();
    if (!reply) {
      console.warn("OpenRouter returned an empty completion");
      throw new BotError("UpstreamUnavailable", "empty completion");
    }

    return reply;
  }
}
