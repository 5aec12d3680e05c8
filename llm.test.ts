import OpenAI from "openai";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { cacheHitRatio, OpenAIGateway } from "@/llm.ts";

function responseBody(text: string) {
  return {
    id: "resp_test",
    object: "response",
    created_at: 0,
    model: "gpt-4o-mini",
    status: "completed",
    output: [
      {
        type: "message",
        id: "msg_test",
        role: "assistant",
        status: "completed",
        content: [{ type: "output_text", text, annotations: [] }],
      },
    ],
    usage: {
      input_tokens: 120,
      input_tokens_details: { cached_tokens: 96 },
      output_tokens: 5,
      output_tokens_details: { reasoning_tokens: 0 },
      total_tokens: 125,
    },
  };
}

function fakeFetch(body: unknown, status = 200) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } })
  );
}

function gatewayWith(fetch: ReturnType<typeof fakeFetch>) {
  const client = new OpenAI({ apiKey: "test-secret", fetch, maxRetries: 0 });
  return new OpenAIGateway({ client, maxRetries: 0 });
}

function sentBody(fetch: ReturnType<typeof fakeFetch>) {
  const init = fetch.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

describe("OpenAIGateway", () => {
  it("sends free text requests with a temperature and returns text and usage", async () => {
    const fetch = fakeFetch(responseBody("['BERT']"));
    const messages = [
      { role: "system" as const, content: "PROMPT" },
      { role: "user" as const, content: "Abstract: BERT" },
    ];

    const completion = await gatewayWith(fetch).create({ input: messages, temperature: 0 });

    expect(completion).toEqual({ text: "['BERT']", usage: { inputTokens: 120, outputTokens: 5, cachedTokens: 96 } });
    expect(String(fetch.mock.calls[0][0])).toMatch(/\/responses$/);
    const body = sentBody(fetch);
    expect(body.model).toBe("gpt-4o-mini");
    expect(body.temperature).toBe(0);
    expect(body.input).toEqual(messages);
    expect(body.reasoning).toBeUndefined();
  });

  it("sends the reasoning effort for reasoning calls", async () => {
    const fetch = fakeFetch(responseBody("<evaluation>\nScore: 1\n</evaluation>"));

    const completion = await gatewayWith(fetch).reason({
      model: "o3-mini",
      input: [{ role: "user", content: "judge this" }],
      reasoningEffort: "high",
    });

    expect(completion.text).toBe("<evaluation>\nScore: 1\n</evaluation>");
    const body = sentBody(fetch);
    expect(body.model).toBe("o3-mini");
    expect(body.reasoning).toEqual({ effort: "high" });
    expect(body.temperature).toBeUndefined();
  });

  it("requests a JSON schema and returns the parsed value", async () => {
    const fetch = fakeFetch(responseBody('{"labels":["BERT","GPT-2"]}'));

    const result = await gatewayWith(fetch).structured({
      input: [{ role: "user", content: "extract" }],
      format: z.object({ labels: z.array(z.string()) }),
      formatName: "labels",
    });

    expect(result).toEqual({ labels: ["BERT", "GPT-2"] });
    const body = sentBody(fetch);
    expect(body.text.format.type).toBe("json_schema");
    expect(body.text.format.name).toBe("labels");
  });

  it("surfaces API errors once retries are exhausted", async () => {
    const fetch = fakeFetch({ error: { message: "server exploded", type: "server_error" } }, 500);

    await expect(gatewayWith(fetch).create({ input: [{ role: "user", content: "hi" }] })).rejects.toThrow();
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe("cacheHitRatio", () => {
  it("divides cached by input tokens", () => {
    expect(cacheHitRatio({ inputTokens: 200, outputTokens: 10, cachedTokens: 50 })).toBe(0.25);
    expect(cacheHitRatio({ inputTokens: 0, outputTokens: 0, cachedTokens: 0 })).toBe(0);
  });
});
