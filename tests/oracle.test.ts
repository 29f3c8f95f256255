import { describe, it, expect, vi, afterEach } from "vitest";
import {
  AnthropicOracle,
  GeminiOracle,
  createOracle,
  geminiEndpoint,
  geminiRequestBody,
} from "../src/oracle.ts";
import type { AnthropicMessages } from "../src/oracle.ts";
import type { AppConfig } from "../src/utils/config.ts";

type CreateParams = Parameters<AnthropicMessages["create"]>[0];

const ENDPOINT = "https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent";

function geminiReply(text: string): Response {
  return new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text }] } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(impl: (url: string | URL | Request, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("geminiRequestBody", () => {
  it("carries the system instruction and prompt", () => {
    expect(geminiRequestBody({ system: "be terse", prompt: "hello" })).toEqual({
      system_instruction: { parts: [{ text: "be terse" }] },
      contents: [{ parts: [{ text: "hello" }] }],
    });
  });

  it("enables Google Search grounding on request", () => {
    expect(geminiRequestBody({ system: "s", prompt: "p", useSearch: true }).tools).toEqual([{ google_search: {} }]);
  });
});

describe("GeminiOracle", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts to the model endpoint and returns the first candidate text", async () => {
    const fetchMock = stubFetch(async () => geminiReply('{"company_name":"Acme"}'));
    const oracle = new GeminiOracle("test-key", "gemini-test");

    const outcome = await oracle.send({ system: "extract", prompt: "HTML", useSearch: true });

    expect(outcome).toEqual({ ok: true, value: '{"company_name":"Acme"}' });
    expect(geminiEndpoint("gemini-test")).toBe(ENDPOINT);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "x-goog-api-key": "test-key", "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({
      system_instruction: { parts: [{ text: "extract" }] },
      contents: [{ parts: [{ text: "HTML" }] }],
      tools: [{ google_search: {} }],
    });
  });

  it("reports a non-2xx status as a transport failure", async () => {
    stubFetch(async () => new Response("quota exceeded", { status: 429, statusText: "Too Many Requests" }));

    const outcome = await new GeminiOracle("test-key", "gemini-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({ ok: false, failure: { kind: "transport", message: "HTTP 429 Too Many Requests" } });
  });

  it("reports a network error as a transport failure", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const outcome = await new GeminiOracle("test-key", "gemini-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({ ok: false, failure: { kind: "transport", message: "fetch failed" } });
  });

  it("reads the first part when later parts carry no text", async () => {
    const body = {
      candidates: [{ content: { parts: [{ text: "https://a.example.com/careers" }, { thoughtSignature: "sig" }] } }],
    };
    stubFetch(async () => new Response(JSON.stringify(body), { status: 200 }));

    const outcome = await new GeminiOracle("test-key", "gemini-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({ ok: true, value: "https://a.example.com/careers" });
  });

  it("reports a first part without text as a shape failure", async () => {
    const body = { candidates: [{ content: { parts: [{ thoughtSignature: "sig" }, { text: "late" }] } }] };
    stubFetch(async () => new Response(JSON.stringify(body), { status: 200 }));

    const outcome = await new GeminiOracle("test-key", "gemini-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "response-shape", message: "Gemini response has no candidate text" },
    });
  });

  it("reports a reply without candidate text as a shape failure", async () => {
    stubFetch(async () => new Response(JSON.stringify({ candidates: [] }), { status: 200 }));

    const outcome = await new GeminiOracle("test-key", "gemini-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "response-shape", message: "Gemini response has no candidate text" },
    });
  });

  it("gives up after the timeout", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    const outcome = await new GeminiOracle("test-key", "gemini-test", 20).send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "transport", message: `Request to ${ENDPOINT} timed out after 20ms` },
    });
  });
});

describe("AnthropicOracle", () => {
  function fakeMessages(reply: () => Promise<{ content: Array<{ type: string; text?: string }> }>) {
    const create = vi.fn((_params: CreateParams) => reply());
    const messages: AnthropicMessages = { create };
    return { messages, create };
  }

  it("joins the text blocks of the reply", async () => {
    const { messages, create } = fakeMessages(async () => ({
      content: [
        { type: "server_tool_use" },
        { type: "web_search_tool_result" },
        { type: "text", text: "https://acme.example" },
        { type: "text", text: "/careers" },
      ],
    }));
    const oracle = new AnthropicOracle(messages, "claude-test");

    const outcome = await oracle.send({ system: "find", prompt: "Acme", useSearch: true });

    expect(outcome).toEqual({ ok: true, value: "https://acme.example/careers" });
    expect(create.mock.calls[0][0]).toEqual({
      model: "claude-test",
      max_tokens: 4096,
      system: "find",
      messages: [{ role: "user", content: "Acme" }],
      tools: [{ type: "web_search_20250305", name: "web_search", max_uses: 5 }],
    });
  });

  it("does not send tools without search", async () => {
    const { messages, create } = fakeMessages(async () => ({ content: [{ type: "text", text: "{}" }] }));

    await new AnthropicOracle(messages, "claude-test").send({ system: "s", prompt: "p" });

    expect(create.mock.calls[0][0].tools).toBeUndefined();
  });

  it("reports SDK errors as transport failures", async () => {
    const { messages } = fakeMessages(async () => {
      throw new Error("401 invalid x-api-key");
    });

    const outcome = await new AnthropicOracle(messages, "claude-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({ ok: false, failure: { kind: "transport", message: "401 invalid x-api-key" } });
  });

  it("reports a reply without text as a shape failure", async () => {
    const { messages } = fakeMessages(async () => ({ content: [{ type: "web_search_tool_result" }] }));

    const outcome = await new AnthropicOracle(messages, "claude-test").send({ system: "s", prompt: "p" });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "response-shape", message: "Anthropic response has no text content" },
    });
  });
});

describe("createOracle", () => {
  const base: AppConfig = {
    provider: "gemini",
    apiKey: "test-key",
    model: "gemini-2.0-flash",
    fetchTimeoutMs: 15000,
    oracleTimeoutMs: 60000,
    preferencesFile: "config/preferences.json",
  };

  it("builds the oracle for the configured provider", () => {
    expect(createOracle(base)).toBeInstanceOf(GeminiOracle);

    const anthropic = createOracle({ ...base, provider: "anthropic", model: "claude-test" });
    expect(anthropic).toBeInstanceOf(AnthropicOracle);
    expect(anthropic.model).toBe("claude-test");
  });
});
