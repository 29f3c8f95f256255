import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import { fetchWithTimeout, HttpStatusError, errorMessage } from "./utils/fetch-with-timeout.ts";
import { fail, succeed } from "./utils/types.ts";
import type { Outcome } from "./utils/types.ts";
import type { AppConfig } from "./utils/config.ts";

export const DEFAULT_ORACLE_TIMEOUT_MS = 60_000;

export interface OracleRequest {
  system: string;
  prompt: string;
  /** Let the model ground its answer with a web search. */
  useSearch?: boolean;
}

/** Text-in, text-out access to a generative model. Never throws. */
export interface Oracle {
  readonly model: string;
  send(request: OracleRequest): Promise<Outcome<string>>;
}

// ── Gemini (REST) ────────────────────────────────────────────────────

const GEMINI_BASE = "https://generativelanguage.googleapis.com/v1beta/models";

// Only candidates[0].content.parts[0].text is read; later parts may carry no text
const geminiResponseSchema = z.object({
  candidates: z
    .tuple([
      z.object({
        content: z.object({
          parts: z.tuple([z.object({ text: z.string() })]).rest(z.unknown()),
        }),
      }),
    ])
    .rest(z.unknown()),
});

export function geminiEndpoint(model: string): string {
  return `${GEMINI_BASE}/${model}:generateContent`;
}

export function geminiRequestBody(request: OracleRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    system_instruction: { parts: [{ text: request.system }] },
    contents: [{ parts: [{ text: request.prompt }] }],
  };
  if (request.useSearch) {
    body.tools = [{ google_search: {} }];
  }
  return body;
}

export class GeminiOracle implements Oracle {
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(apiKey: string, model: string, timeoutMs: number = DEFAULT_ORACLE_TIMEOUT_MS) {
    this.apiKey = apiKey;
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async send(request: OracleRequest): Promise<Outcome<string>> {
    let payload: unknown;
    try {
      payload = await fetchWithTimeout(
        geminiEndpoint(this.model),
        {
          method: "POST",
          headers: {
            "x-goog-api-key": this.apiKey,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(geminiRequestBody(request)),
        },
        this.timeoutMs,
        async (response) => {
          if (!response.ok) throw new HttpStatusError(response.status, response.statusText);
          return response.json();
        }
      );
    } catch (err) {
      return fail("transport", errorMessage(err));
    }

    const parsed = geminiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return fail("response-shape", "Gemini response has no candidate text");
    }
    return succeed(parsed.data.candidates[0].content.parts[0].text);
  }
}

// ── Anthropic (SDK) ──────────────────────────────────────────────────

const ANTHROPIC_MAX_TOKENS = 4096;
const WEB_SEARCH_MAX_USES = 5;

/** The part of the SDK client the oracle calls. */
export interface AnthropicMessages {
  create(
    params: Anthropic.Messages.MessageCreateParamsNonStreaming
  ): Promise<{ content: Array<{ type: string; text?: string }> }>;
}

export class AnthropicOracle implements Oracle {
  readonly model: string;
  private readonly messages: AnthropicMessages;

  constructor(messages: AnthropicMessages, model: string) {
    this.messages = messages;
    this.model = model;
  }

  static fromKey(apiKey: string, model: string, timeoutMs: number = DEFAULT_ORACLE_TIMEOUT_MS): AnthropicOracle {
    const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
    return new AnthropicOracle(client.messages, model);
  }

  async send(request: OracleRequest): Promise<Outcome<string>> {
    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
    };
    if (request.useSearch) {
      params.tools = [{ type: "web_search_20250305", name: "web_search", max_uses: WEB_SEARCH_MAX_USES }];
    }

    let content: Array<{ type: string; text?: string }>;
    try {
      ({ content } = await this.messages.create(params));
    } catch (err) {
      return fail("transport", errorMessage(err));
    }

    // Search results arrive as extra blocks; only the text blocks carry the answer
    const text = content.map((block) => (block.type === "text" ? (block.text ?? "") : "")).join("");
    if (text.trim() === "") {
      return fail("response-shape", "Anthropic response has no text content");
    }
    return succeed(text);
  }
}

export function createOracle(config: AppConfig): Oracle {
  switch (config.provider) {
    case "anthropic":
      return AnthropicOracle.fromKey(config.apiKey, config.model, config.oracleTimeoutMs);
    case "gemini":
      return new GeminiOracle(config.apiKey, config.model, config.oracleTimeoutMs);
  }
}
