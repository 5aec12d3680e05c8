import "dotenv/config";
import { loadConfig } from "@/config.ts";
import { OpenAIGateway } from "@/llm.ts";
import { buildOptimizer } from "@/pipelines.ts";
import { errorMessage, traceLog } from "@/utils.ts";
import { Command, InvalidArgumentError } from "commander";

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

const program = new Command()
  .name("promptjudge")
  .description("Improve a system prompt with an LLM judge and metaprompting")
  .option("-c, --config <file>", "config file (default: promptjudge.json)")
  .option("-r, --rounds <n>", "override the number of rounds", positiveInt)
  .parse();

const args = program.opts<{ config?: string; rounds?: number }>();

try {
  const config = await loadConfig(args.config);
  if (args.rounds !== undefined) {
    config.maxRounds = args.rounds;
  }

  const gateway = new OpenAIGateway({ timeout: config.timeout, maxRetries: config.maxRetries });
  const optimizer = await buildOptimizer(config, gateway);
  const state = await optimizer.fit();

  traceLog(`Best score: ${state.best?.averageScore.toFixed(4)} at round ${state.best?.roundIndex}`);
  console.log("promptjudge completed successfully.");
} catch (error) {
  traceLog("promptjudge failed", { error: errorMessage(error) });
  process.exitCode = 1;
}
