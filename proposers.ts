import { type ModelGateway, type ReasoningEffort, traceUsage } from "@/llm.ts";
import type { JudgedRecord, Metaprompter, OutputMode, PromptDocument } from "@/types.ts";
import { formatLabels, INSTRUCTIONS_CLOSE, INSTRUCTIONS_OPEN, renderPrompt, traceLog } from "@/utils.ts";
import { z } from "zod";

export function buildMetaprompt(prompt: PromptDocument, records: readonly JudgedRecord[], task: string): string {
  const examples = records.map(({ item, judged }) => `
Item: ${item.id}
Input: ${item.inputText}
Gold Labels: ${formatLabels(item.goldLabels)}
Prediction: ${formatLabels(judged.prediction.labels)}
Score: ${judged.score}
Explanation: ${judged.explanation}
`).join("\n");

  return `
You are an expert prompt engineer tasked with improving a system prompt for ${task}.

Here is the current prompt to improve:
<prompt>
${renderPrompt(prompt)}
</prompt>

Here are evaluations of model predictions using the current prompt:
<eval_examples>
${examples}
</eval_examples>

Based on these evaluations and their details like explanations and scores, make important observations to improve the instructions found inside of ${INSTRUCTIONS_OPEN}${INSTRUCTIONS_CLOSE}.
Everything outside of ${INSTRUCTIONS_OPEN}${INSTRUCTIONS_CLOSE} stays as it is and must not be repeated.
Output only the improved instructions that go between the tags.`.trim();
}

/**
 * Keeps only what a reply puts inside the instruction tags. A reply that
 * echoes just one of the tags is cut at it, and stray tags are dropped.
 */
export function extractInstructions(reply: string): string {
  let text = reply;
  const start = text.indexOf(INSTRUCTIONS_OPEN);
  if (start >= 0) {
    text = text.slice(start + INSTRUCTIONS_OPEN.length);
  }
  const end = text.indexOf(INSTRUCTIONS_CLOSE);
  if (end >= 0) {
    text = text.slice(0, end);
  }
  return text.replaceAll(INSTRUCTIONS_OPEN, "").replaceAll(INSTRUCTIONS_CLOSE, "").trim();
}

const instructionsFormat = z.object({ instructions: z.string() });

/**
 * Rewrites only the instruction region of a prompt; the returned document
 * keeps the preamble and postamble it was given.
 */
export function llmMetaprompter(
  gateway: ModelGateway,
  params: { model?: string; reasoningEffort?: ReasoningEffort; task?: string; mode?: OutputMode } = {},
): Metaprompter {
  const task = params.task ?? "extracting model names from machine learning paper abstracts";

  return async (prompt: PromptDocument, records: readonly JudgedRecord[]): Promise<PromptDocument> => {
    traceLog("Generating metaprompt for prompt improvement...", { evaluations: records.length });

    const input = [{ role: "user" as const, content: buildMetaprompt(prompt, records, task) }];
    const model = params.model ?? "o3-mini";
    const reasoningEffort = params.reasoningEffort ?? "high";

    let instructions = "";
    if (params.mode === "structured") {
      const resp = await gateway.structured({ model, input, reasoningEffort, format: instructionsFormat, formatName: "result" });
      instructions = extractInstructions(resp?.instructions ?? "");
      if (!instructions) {
        traceLog("structured instructions came back empty, falling back to text");
      }
    }
    if (!instructions) {
      const resp = await gateway.reason({ model, input, reasoningEffort });
      traceUsage("metaprompt usage", resp.usage);
      instructions = extractInstructions(resp.text);
    }

    if (!instructions) {
      traceLog("metaprompter returned no instructions, keeping the current ones");
      return prompt;
    }

    traceLog("new instructions generated", { instructions });
    return { ...prompt, instructions: `\n${instructions}\n` };
  };
}
