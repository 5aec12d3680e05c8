import type { ArtifactWriter, Candidate, OptimizationState } from "@/types.ts";
import { traceLog } from "@/utils.ts";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";

export function evaluationRecords(candidate: Candidate) {
  return candidate.records.map(({ item, judged }) => ({
    id: item.id,
    input: item.inputText,
    goldLabels: [...item.goldLabels],
    prediction: [...judged.prediction.labels],
    rawPrediction: judged.prediction.rawText,
    score: judged.score,
    explanation: judged.explanation,
  }));
}

export function roundSummary(candidate: Candidate): string {
  return [
    `Round: ${candidate.roundIndex}`,
    `Average Score: ${candidate.averageScore.toFixed(4)}`,
    "",
    "System Prompt:",
    candidate.promptText,
  ].join("\n");
}

export function historyCsv(history: readonly number[]): string {
  return ["Round,Score", ...history.map((score, round) => `${round},${score}`)].join("\n") + "\n";
}

export function finalSummary(state: OptimizationState): string {
  if (!state.best) {
    throw new Error("No completed rounds to summarize");
  }
  return [
    `Best Round: ${state.best.roundIndex}`,
    `Best Score: ${state.best.averageScore.toFixed(4)}`,
    "",
    "Performance History:",
    ...state.history.map((score, round) => `Round ${round}: ${score.toFixed(4)}`),
    "",
    "Best System Prompt:",
    state.best.promptText,
  ].join("\n");
}

/** writes per-round and final artifacts as flat files under `outputDir` */
export const fileArtifactWriter = (outputDir: string): ArtifactWriter => ({
  async writeRound(candidate: Candidate) {
    await mkdir(outputDir, { recursive: true });
    const r = candidate.roundIndex;
    await writeFile(path.join(outputDir, `system_prompt_round_${r}.txt`), candidate.promptText);
    await writeFile(
      path.join(outputDir, `evaluations_round_${r}.json`),
      JSON.stringify(evaluationRecords(candidate), null, 2),
    );
    await writeFile(path.join(outputDir, `summary_round_${r}.txt`), roundSummary(candidate));
  },

  async writeFinal(state: OptimizationState) {
    const summary = finalSummary(state);
    await mkdir(outputDir, { recursive: true });
    await writeFile(path.join(outputDir, "best_system_prompt.txt"), state.best?.promptText ?? "");
    await writeFile(path.join(outputDir, "performance_history.csv"), historyCsv(state.history));
    await writeFile(path.join(outputDir, "final_summary.txt"), summary);
    traceLog(`Final results saved to ${outputDir}`);
  },
});

export const consoleArtifactWriter = (): ArtifactWriter => ({
  async writeRound(candidate: Candidate) {
    traceLog(`Round ${candidate.roundIndex} complete`, { averageScore: candidate.averageScore });
  },

  async writeFinal(state: OptimizationState) {
    console.log("Best prompt:");
    console.log(finalSummary(state));
  },
});
