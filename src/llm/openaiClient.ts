/**
 * OpenAI chat-completions client.
 *
 * ask() always resolves: any failure of the remote call is logged and
 * replaced by APOLOGY_MESSAGE, so a chat turn never ends without a reply.
 */
import { log } from "../utils/log.js";

export const SYSTEM_PROMPT =
  "You are a helpful planning assistant for productivity, goals and daily focus. " +
  "Answer concisely in the user's language unless asked otherwise.";

export const APOLOGY_MESSAGE = "⚠️ Sorry, I can't get an answer from the AI right now.";

export interface CompletionClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

/** Anything that can answer a question. The router depends on this, not on the HTTP client. */
export interface Completer {
  ask(prompt: string): Promise<string>;
}

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export class CompletionError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompletionError";
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Pull choices[0].message.content out of a chat-completions response body. */
export function extractContent(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.choices)) return null;
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === "string" ? content : null;
}

export class CompletionClient implements Completer {
  private readonly opts: CompletionClientOptions;
  private readonly fetchFn: typeof fetch;

  constructor(opts: CompletionClientOptions) {
    this.opts = opts;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async ask(prompt: string): Promise<string> {
    const started = Date.now();
    try {
      const answer = await this.complete([
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ]);
      log.info(`[openai] ${this.opts.model} — ${answer.length} chars in ${Date.now() - started}ms`);
      return answer;
    } catch (err) {
      log.error("[openai] Completion failed:", err);
      return APOLOGY_MESSAGE;
    }
  }

  private async complete(messages: ChatMessage[]): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);

    try {
      const res = await this.fetchFn(`${this.opts.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.opts.apiKey}`,
        },
        body: JSON.stringify({
          model: this.opts.model,
          messages,
          max_tokens: this.opts.maxTokens,
          temperature: this.opts.temperature,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const errBody = await res.text().catch(() => "");
        throw new CompletionError(`OpenAI API ${res.status}: ${errBody.slice(0, 300)}`, res.status);
      }

      const content = extractContent(await res.json())?.trim();
      if (!content) throw new CompletionError("No content in OpenAI response");
      return content;
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new CompletionError(`OpenAI request timed out (${this.opts.timeoutMs / 1000}s)`, undefined, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
