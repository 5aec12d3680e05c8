import { type Config, loadInitialPrompt } from "@/config.ts";
import { llmJudge } from "@/evaluators.ts";
import type { ModelGateway } from "@/llm.ts";
import { corpusFileLoader } from "@/loaders.ts";
import { PromptOptimizer } from "@/optimizer.ts";
import { fileArtifactWriter } from "@/output.ts";
import { llmMetaprompter } from "@/proposers.ts";
import { labelPredictor } from "@/runners.ts";
import type { ArtifactWriter } from "@/types.ts";

/** wires the loader, predictor, judge and metaprompter described by a config around one gateway */
export async function buildOptimizer(
  config: Config,
  gateway: ModelGateway,
  writer: ArtifactWriter = fileArtifactWriter(config.outputDir),
): Promise<PromptOptimizer> {
  const { mode, task } = config;

  return new PromptOptimizer(
    corpusFileLoader(config.corpusPath, config.fields),
    await loadInitialPrompt(config),
    labelPredictor(gateway, {
      model: config.predictor.model,
      temperature: config.predictor.temperature,
      inputPrefix: config.predictor.inputPrefix,
      prefix: config.predictor.labelPrefix,
      sentinel: config.predictor.sentinel,
      mode,
    }),
    llmJudge(gateway, { ...config.judge, task, mode }),
    llmMetaprompter(gateway, { ...config.metaprompter, task, mode }),
    writer,
    { maxRounds: config.maxRounds, stopOnRegression: config.stopOnRegression },
  );
}
