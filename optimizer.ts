import { judgeAll } from "@/evaluators.ts";
import { predictAll } from "@/runners.ts";
import type {
  ArtifactWriter,
  Candidate,
  CorpusLoader,
  Judge,
  Metaprompter,
  OptimizationState,
  Predictor,
  PromptDocument,
} from "@/types.ts";
import { promptBuilder, renderPrompt, traceLog } from "@/utils.ts";

/**
 * Folds a finished round into the state. The best candidate only changes on a
 * strictly higher average, so on a tie the earlier round stays best.
 */
export function recordRound(state: OptimizationState, candidate: Candidate): OptimizationState {
  const best = state.best === null || candidate.averageScore > state.best.averageScore ? candidate : state.best;
  return { best, history: [...state.history, candidate.averageScore] };
}

export class PromptOptimizer {
  private readonly loader: CorpusLoader;
  private readonly initialPrompt: PromptDocument;
  private readonly predictor: Predictor;
  private readonly judge: Judge;
  private readonly metaprompter: Metaprompter;
  private readonly writer: ArtifactWriter;
  private readonly opts: { maxRounds: number; stopOnRegression: boolean };
  private state: OptimizationState = { best: null, history: [] };

  constructor(
    loader: CorpusLoader,
    initialPrompt: string | PromptDocument,
    predictor: Predictor,
    judge: Judge,
    metaprompter: Metaprompter,
    writer: ArtifactWriter,
    opts: { maxRounds?: number; stopOnRegression?: boolean } = {},
  ) {
    this.loader = loader;
    this.initialPrompt = typeof initialPrompt === "string" ? promptBuilder(initialPrompt) : initialPrompt;
    this.predictor = predictor;
    this.judge = judge;
    this.metaprompter = metaprompter;
    this.writer = writer;
    this.opts = {
      maxRounds: opts.maxRounds ?? 5,
      stopOnRegression: opts.stopOnRegression ?? false,
    };
    if (!Number.isInteger(this.opts.maxRounds) || this.opts.maxRounds < 1) {
      throw new Error(`maxRounds must be a positive integer, got ${this.opts.maxRounds}`);
    }
  }

  async fit(): Promise<OptimizationState> {
    const startTime = Date.now();
    const corpus = await this.loader();
    if (!corpus.length) {
      throw new Error("Cannot optimize a prompt against an empty corpus");
    }
    this.state = { best: null, history: [] };

    console.log("\n");
    console.log(`📊 Dataset: ${corpus.length} items`);
    console.log(`🔄 Rounds: ${this.opts.maxRounds}`);
    console.log(`🏁 Stop on regression: ${this.opts.stopOnRegression}\n`);

    let prompt = this.initialPrompt;
    for (let round = 0; round < this.opts.maxRounds; round++) {
      traceLog(`==== Round ${round} ====`);

      const promptText = renderPrompt(prompt);
      const predictions = await predictAll(corpus, promptText, this.predictor);
      const { records, averageScore } = await judgeAll(corpus, predictions, this.judge);

      const candidate: Candidate = { roundIndex: round, promptText, records, averageScore };
      await this.writer.writeRound(candidate);

      const previous = this.state.history[this.state.history.length - 1];
      this.state = recordRound(this.state, candidate);
      if (this.state.best === candidate) {
        traceLog(`New best score: ${averageScore.toFixed(4)} at round ${round}`);
      } else {
        traceLog(`Score did not improve. Current: ${averageScore.toFixed(4)}, Best: ${this.state.best?.averageScore.toFixed(4)}`);
      }

      if (this.opts.stopOnRegression && previous !== undefined && averageScore < previous) {
        traceLog(`Score regressed from ${previous.toFixed(4)}, stopping after round ${round}`);
        break;
      }

      // only generate a new prompt if we have more rounds to go
      if (round < this.opts.maxRounds - 1) {
        prompt = await this.metaprompter(prompt, records);
      }
    }

    await this.writer.writeFinal(this.state);

    const totalTime = (Date.now() - startTime) / 1000;
    console.log(`\n⏱️  Total optimization time: ${totalTime.toFixed(2)}s`);
    return this.state;
  }
}
