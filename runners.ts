import { type ModelGateway, traceUsage } from "@/llm.ts";
import type { CorpusItem, OutputMode, Prediction, Predictor } from "@/types.ts";
import { errorMessage, parseListLiteral, traceLog } from "@/utils.ts";
import { z } from "zod";

export const SENTINEL = "NA";

export interface LabelParseOptions {
  prefix?: string;
  sentinel?: string;
}

/**
 * Best effort decoding of a model reply into labels: the whole reply as a list
 * literal, then the first bracketed span, then the sentinel list.
 */
export function parseLabels(raw: string, options: LabelParseOptions = {}): string[] {
  const sentinel = options.sentinel ?? SENTINEL;
  const prefix = options.prefix ?? "Tags: ";

  const text = prefix ? raw.replaceAll(prefix, "") : raw;
  let labels = parseListLiteral(text);
  if (!labels) {
    const match = text.match(/\[(.*?)\]/);
    labels = match ? parseListLiteral(match[0]) : null;
  }

  const cleaned = labels?.map((label) => label.trim()) ?? [];
  return cleaned.length ? cleaned : [sentinel];
}

const labelsFormat = z.object({ labels: z.array(z.string()) });

export function labelPredictor(
  gateway: ModelGateway,
  params: {
    model?: string;
    temperature?: number;
    inputPrefix?: string;
    mode?: OutputMode;
  } & LabelParseOptions = {},
): Predictor {
  const sentinel = params.sentinel ?? SENTINEL;

  return async (item: CorpusItem, prompt: string): Promise<Prediction> => {
    traceLog(`running for item: "${item.inputText.slice(0, 50)}..."`);

    const input = [
      { role: "system" as const, content: prompt },
      { role: "user" as const, content: `${params.inputPrefix ?? "Abstract: "}${item.inputText}` },
    ];

    try {
      if (params.mode === "structured") {
        const resp = await gateway.structured({
          model: params.model,
          input,
          temperature: params.temperature ?? 0,
          format: labelsFormat,
          formatName: "labels",
        });
        const labels = resp?.labels.map((label) => label.trim()).filter((label) => label.length > 0);
        if (resp && labels?.length) {
          return { itemId: item.id, rawText: JSON.stringify(resp.labels), labels };
        }
        traceLog("structured prediction came back empty, falling back to text", { item: item.id });
      }

      const resp = await gateway.create({ model: params.model, input, temperature: params.temperature ?? 0 });
      traceUsage(`prediction usage for item ${item.id}`, resp.usage);
      return { itemId: item.id, rawText: resp.text, labels: parseLabels(resp.text, params) };
    } catch (error) {
      traceLog(`prediction failed for item ${item.id}`, { error: errorMessage(error) });
      return { itemId: item.id, rawText: "", labels: [sentinel] };
    }
  };
}

/** one prediction per item, in corpus order */
export async function predictAll(
  corpus: readonly CorpusItem[],
  prompt: string,
  predictor: Predictor,
): Promise<Prediction[]> {
  traceLog("Generating predictions...");
  const predictions: Prediction[] = [];
  for (const item of corpus) {
    predictions.push(await predictor(item, prompt));
  }
  traceLog(`Generated predictions for ${predictions.length} items`);
  return predictions;
}
