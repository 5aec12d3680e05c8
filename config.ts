import { errorMessage } from "@/utils.ts";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "promptjudge.json";

export const DEFAULT_PROMPT = `Your task is to extract model names from machine learning paper abstracts. Your response is an array of the model names in the format ["model_name"]. If you don't find model names in the abstract or you are not sure, return ["NA"].
<instructions>
- Extract model names only, avoid things that are not model names like architectures and dataset names
</instructions>
`;

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const reasoningEffort = z.enum(["low", "medium", "high"]);

export const ConfigSchema = z
  .object({
    corpusPath: z.string().default("data/val_data.json"),
    outputDir: z.string().default("results"),
    /** file holding the first round's prompt, the built-in prompt when absent */
    initialPromptPath: z.string().optional(),
    maxRounds: z.number().int().positive().default(5),
    stopOnRegression: z.boolean().default(false),
    mode: z.enum(["text", "structured"]).default("text"),
    task: z.string().optional(),
    fields: z
      .object({
        id: z.string().default("id"),
        text: z.string().default("input_text"),
        labels: z.string().default("gold_labels"),
      })
      .default({}),
    predictor: z
      .object({
        model: z.string().default("gpt-4o-mini"),
        temperature: z.number().min(0).max(2).default(0),
        inputPrefix: z.string().default("Abstract: "),
        labelPrefix: z.string().default("Tags: "),
        sentinel: z.string().min(1).default("NA"),
      })
      .default({}),
    judge: z
      .object({
        model: z.string().default("o3-mini"),
        reasoningEffort: reasoningEffort.default("low"),
      })
      .default({}),
    metaprompter: z
      .object({
        model: z.string().default("o3-mini"),
        reasoningEffort: reasoningEffort.default("high"),
      })
      .default({}),
    timeout: z.number().int().positive().default(60_000),
    maxRetries: z.number().int().min(0).default(3),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown, baseDir = "."): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { cause: result.error });
  }

  const config = result.data;
  return {
    ...config,
    corpusPath: path.resolve(baseDir, config.corpusPath),
    outputDir: path.resolve(baseDir, config.outputDir),
    initialPromptPath: config.initialPromptPath && path.resolve(baseDir, config.initialPromptPath),
  };
}

/**
 * Reads the configuration file. Without an explicit path a missing
 * `promptjudge.json` just means defaults; relative paths inside the file are
 * resolved against its directory.
 */
function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** reads `filePath`, or `defaultFile` when given none; a missing default file means all defaults */
export async function loadConfig(filePath?: string, defaultFile = DEFAULT_CONFIG_FILE): Promise<Config> {
  const target = filePath ?? defaultFile;

  let content: string;
  try {
    content = await readFile(target, "utf8");
  } catch (error) {
    if (!filePath && isMissingFile(error)) {
      return parseConfig({});
    }
    throw new ConfigError(`Could not load config ${target}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not load config ${target}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(raw, path.dirname(path.resolve(target)));
}

export async function loadInitialPrompt(config: Config): Promise<string> {
  if (!config.initialPromptPath) {
    return DEFAULT_PROMPT;
  }
  try {
    return await readFile(config.initialPromptPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Could not read initial prompt ${config.initialPromptPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
