import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { labelPredictor, parseLabels, predictAll } from "@/runners.ts";
import { FakeGateway, lastContent, scripted } from "@/testing.ts";
import type { CorpusItem } from "@/types.ts";

const itemA: CorpusItem = { id: "a", inputText: "We fine-tune BERT.", goldLabels: new Set(["BERT"]) };
const itemB: CorpusItem = { id: "b", inputText: "No models here.", goldLabels: new Set(["NA"]) };

describe("parseLabels", () => {
  it("parses a clean list literal", () => {
    expect(parseLabels("['BERT', 'GPT-4']")).toEqual(["BERT", "GPT-4"]);
  });

  it("strips the label prefix", () => {
    expect(parseLabels("Tags: ['BERT']")).toEqual(["BERT"]);
  });

  it("falls back to the first bracketed span", () => {
    expect(parseLabels('The models are ["GPT-4", "NA"] and more [x]')).toEqual(["GPT-4", "NA"]);
  });

  it("returns the sentinel list for malformed text", () => {
    expect(parseLabels("not a list")).toEqual(["NA"]);
    expect(parseLabels("[1, 2]")).toEqual(["NA"]);
  });

  it("never returns an empty list", () => {
    expect(parseLabels("[]")).toEqual(["NA"]);
  });

  it("trims labels and honours a custom sentinel", () => {
    expect(parseLabels("[' BERT ']")).toEqual(["BERT"]);
    expect(parseLabels("nothing", { sentinel: "NONE" })).toEqual(["NONE"]);
  });
});

describe("labelPredictor", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends the prompt as system message and the input as user message at temperature 0", async () => {
    const gateway = new FakeGateway({ create: scripted("['BERT']") });
    const prediction = await labelPredictor(gateway)(itemA, "PROMPT");

    expect(prediction).toEqual({ itemId: "a", rawText: "['BERT']", labels: ["BERT"] });
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].kind).toBe("create");
    expect(gateway.calls[0].params.temperature).toBe(0);
    expect(gateway.calls[0].params.input).toEqual([
      { role: "system", content: "PROMPT" },
      { role: "user", content: "Abstract: We fine-tune BERT." },
    ]);
  });

  it("returns the sentinel prediction when the gateway fails", async () => {
    const gateway = new FakeGateway({ create: scripted(new Error("Request timed out.")) });
    const prediction = await labelPredictor(gateway)(itemA, "PROMPT");

    expect(prediction).toEqual({ itemId: "a", rawText: "", labels: ["NA"] });
  });

  it("prefers structured output in structured mode", async () => {
    const gateway = new FakeGateway({ structured: () => ({ labels: [" BERT "] }) });
    const prediction = await labelPredictor(gateway, { mode: "structured" })(itemA, "PROMPT");

    expect(prediction).toEqual({ itemId: "a", rawText: '[" BERT "]', labels: ["BERT"] });
    expect(gateway.calls.map((c) => c.kind)).toEqual(["structured"]);
  });

  it("falls back to text when structured output is empty", async () => {
    const gateway = new FakeGateway({
      structured: () => null,
      create: scripted("Tags: ['RoBERTa']"),
    });
    const prediction = await labelPredictor(gateway, { mode: "structured" })(itemA, "PROMPT");

    expect(prediction.labels).toEqual(["RoBERTa"]);
    expect(gateway.calls.map((c) => c.kind)).toEqual(["structured", "create"]);
  });

  it("logs token usage with the cache hit ratio", async () => {
    const gateway = new FakeGateway({
      create: () => ({ text: "['BERT']", usage: { inputTokens: 100, outputTokens: 4, cachedTokens: 80 } }),
    });
    await labelPredictor(gateway)(itemA, "PROMPT");

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("prediction usage for item a"));
    const usage = { inputTokens: 100, outputTokens: 4, cachedTokens: 80, cacheHitRatio: 0.8 };
    expect(console.log).toHaveBeenCalledWith(`  └─ ${JSON.stringify(usage, null, 2)}`);
  });
});

describe("predictAll", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps one prediction per item in order even when a call times out", async () => {
    const gateway = new FakeGateway({
      create: (params) => {
        if (lastContent(params).includes("No models here")) {
          throw new Error("Request timed out.");
        }
        return "['BERT']";
      },
    });

    const predictions = await predictAll([itemA, itemB], "PROMPT", labelPredictor(gateway));

    expect(predictions).toEqual([
      { itemId: "a", rawText: "['BERT']", labels: ["BERT"] },
      { itemId: "b", rawText: "", labels: ["NA"] },
    ]);
  });
});
