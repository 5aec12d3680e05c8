import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@/config.ts";
import { buildOptimizer } from "@/pipelines.ts";
import { FakeGateway, lastContent } from "@/testing.ts";

const exampleConfig = fileURLToPath(new URL("./promptjudge.json", import.meta.url));
const examplePrompt = fileURLToPath(new URL("./examples/model-names/prompt.txt", import.meta.url));

describe("buildOptimizer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "pipeline-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("runs the example task end to end", async () => {
    const config = { ...(await loadConfig(exampleConfig)), outputDir: dir, maxRounds: 2 };
    const gateway = new FakeGateway({
      create: () => "Tags: ['NA']",
      reason: (params) => {
        const content = lastContent(params);
        if (content.includes("<eval_examples>")) {
          return "- Return [\"NA\"] unless a named model is trained or evaluated";
        }
        const score = content.includes('<gold>\n["NA"]\n</gold>') ? 1 : 0.25;
        return `<evaluation>\nScore: ${score}\nExplanation: compared\n</evaluation>`;
      },
    });

    const state = await (await buildOptimizer(config, gateway)).fit();

    expect(state.history).toEqual([0.4375, 0.4375]);
    expect(state.best?.roundIndex).toBe(0);

    const initial = await readFile(examplePrompt, "utf8");
    expect(await readFile(path.join(dir, "system_prompt_round_0.txt"), "utf8")).toBe(initial);
    expect(await readFile(path.join(dir, "best_system_prompt.txt"), "utf8")).toBe(initial);
    expect(await readFile(path.join(dir, "performance_history.csv"), "utf8")).toBe("Round,Score\n0,0.4375\n1,0.4375\n");

    const second = await readFile(path.join(dir, "system_prompt_round_1.txt"), "utf8");
    expect(second).toBe(
      initial.replace(
        /<instructions>[\s\S]*<\/instructions>/,
        "<instructions>\n- Return [\"NA\"] unless a named model is trained or evaluated\n</instructions>",
      ),
    );

    const evaluations = JSON.parse(await readFile(path.join(dir, "evaluations_round_0.json"), "utf8"));
    expect(evaluations.map((e: { id: string }) => e.id)).toEqual([
      "sparse-adapters",
      "tabular-trees",
      "vision-distill",
      "speech-align",
    ]);
    expect(evaluations[3].goldLabels).toEqual(["Whisper", "PhonAlign"]);

    const predictionCalls = gateway.calls.filter((c) => c.kind === "create");
    expect(predictionCalls).toHaveLength(8);
    expect(predictionCalls[0].params.model).toBe("gpt-4o-mini");
  });
});
