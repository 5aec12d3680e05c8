import { type ModelGateway, type ReasoningEffort, traceUsage } from "@/llm.ts";
import type { CorpusItem, JudgedPrediction, Judge, JudgedRecord, OutputMode, Prediction } from "@/types.ts";
import { errorMessage, formatLabels, mean, traceLog } from "@/utils.ts";
import { z } from "zod";

export const PARSE_ERROR_EXPLANATION = "Error parsing evaluation";

const EVAL_OPEN = "<evaluation>";
const EVAL_CLOSE = "</evaluation>";
const FLOAT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface Evaluation {
  score: number;
  explanation: string;
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export function buildJudgePrompt(item: CorpusItem, prediction: Prediction, task: string): string {
  return `
<abstract>
${item.inputText}
</abstract>

<prediction>
${formatLabels(prediction.labels)}
</prediction>

<gold>
${formatLabels(item.goldLabels)}
</gold>

Your task is to evaluate how well the prediction matches the gold labels for ${task}.

Evaluation criteria:
1. Precision: Are all predicted labels actually present in the input and are they correct labels?
2. Recall: Did the prediction capture all labels present in the input?
3. Accuracy: Did the prediction correctly tell labels apart from things that are not labels?

First, analyze the input to identify which labels are actually present.
Then compare the prediction to the gold labels.

Give a score between 0.0 (completely wrong) and 1.0 (perfect match), with partial credit for partial matches.
Explain your scoring with specific details about what was correct and incorrect in the prediction.

Your response should be in the format:
${EVAL_OPEN}
Score: [score between 0.0 and 1.0]
Explanation: [detailed explanation]
${EVAL_CLOSE}`.trim();
}

/**
 * Reads the `Score:` and `Explanation:` lines out of an evaluation block.
 * Any reply that does not follow the format scores 0.
 */
export function parseEvaluation(response: string): Evaluation {
  const failed = (reason: string): Evaluation => {
    traceLog(`Error parsing evaluation: ${reason}`, { response });
    return { score: 0, explanation: PARSE_ERROR_EXPLANATION };
  };

  const start = response.indexOf(EVAL_OPEN);
  if (start < 0) {
    return failed("missing evaluation block");
  }
  const body = response.slice(start + EVAL_OPEN.length).split(EVAL_CLOSE)[0].trim();

  const scoreLine = body.split("\n").find((line) => line.trim().startsWith("Score:"));
  if (scoreLine === undefined) {
    return failed("missing score line");
  }
  const value = scoreLine.trim().slice("Score:".length).trim();
  if (!FLOAT.test(value)) {
    return failed(`score is not a number: ${value}`);
  }
  const score = Number(value);
  if (!Number.isFinite(score)) {
    return failed(`score is not finite: ${value}`);
  }

  let explanation = body.replace(scoreLine, "").trim();
  if (explanation.startsWith("Explanation:")) {
    explanation = explanation.slice("Explanation:".length).trim();
  }
  return { score: clampScore(score), explanation };
}

const evaluationFormat = z.object({ score: z.number(), explanation: z.string() });

export function llmJudge(
  gateway: ModelGateway,
  params: { model?: string; reasoningEffort?: ReasoningEffort; task?: string; mode?: OutputMode } = {},
): Judge {
  const task = params.task ?? "extracting model names from a machine learning paper abstract";

  return async (item: CorpusItem, prediction: Prediction): Promise<JudgedPrediction> => {
    const input = [{ role: "user" as const, content: buildJudgePrompt(item, prediction, task) }];
    const model = params.model ?? "o3-mini";
    const reasoningEffort = params.reasoningEffort ?? "low";

    try {
      if (params.mode === "structured") {
        const resp = await gateway.structured({ model, input, reasoningEffort, format: evaluationFormat, formatName: "evaluation" });
        if (resp && Number.isFinite(resp.score)) {
          return { prediction, score: clampScore(resp.score), explanation: resp.explanation.trim() };
        }
        traceLog("structured evaluation came back empty, falling back to text", { item: item.id });
      }

      const resp = await gateway.reason({ model, input, reasoningEffort });
      traceUsage(`evaluation usage for item ${item.id}`, resp.usage);
      return { prediction, ...parseEvaluation(resp.text) };
    } catch (error) {
      traceLog(`evaluation failed for item ${item.id}`, { error: errorMessage(error) });
      return { prediction, score: 0, explanation: `Evaluation failed: ${errorMessage(error)}` };
    }
  };
}

/** judges each prediction against its item and returns the records with their mean score */
export async function judgeAll(
  corpus: readonly CorpusItem[],
  predictions: readonly Prediction[],
  judge: Judge,
): Promise<{ records: JudgedRecord[]; averageScore: number }> {
  traceLog("Evaluating predictions...");
  const records: JudgedRecord[] = [];

  for (const [i, item] of corpus.entries()) {
    traceLog(`Evaluating item ${i + 1}/${corpus.length}: ${item.id}`);
    const judged = await judge(item, predictions[i]);
    traceLog(`Score: ${judged.score.toFixed(4)}`, {
      gold: [...item.goldLabels],
      prediction: judged.prediction.labels,
    });
    records.push({ item, judged });
  }

  const averageScore = mean(records.map((r) => r.judged.score));
  traceLog(`Evaluation complete. Average score: ${averageScore.toFixed(4)}`);
  return { records, averageScore };
}
