import type { CorpusItem, CorpusLoader } from "@/types.ts";
import { errorMessage, parseListLiteral, traceLog } from "@/utils.ts";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { parse } from "yaml";
import { z } from "zod";

export class CorpusLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CorpusLoadError";
  }
}

/** record keys holding the identifier, the input text and the gold labels */
export interface CorpusFields {
  id: string;
  text: string;
  labels: string;
}

export const DEFAULT_FIELDS: CorpusFields = { id: "id", text: "input_text", labels: "gold_labels" };

const documentSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Gold labels arrive either as a list or as a string holding a list literal.
 * Anything that cannot be decoded becomes an empty set so one bad record does
 * not sink the whole corpus.
 */
export function decodeGoldLabels(value: unknown, context = "record"): ReadonlySet<string> {
  let raw: unknown[];
  if (Array.isArray(value)) {
    raw = value;
  } else if (typeof value === "string") {
    const parsed = parseListLiteral(value);
    if (!parsed) {
      traceLog(`Warning: could not parse gold labels of ${context}`, { value });
      return new Set();
    }
    raw = parsed;
  } else {
    traceLog(`Warning: unknown gold labels type of ${context}`, { type: typeof value });
    return new Set();
  }

  const labels = new Set<string>();
  for (const label of raw) {
    if (typeof label !== "string") {
      traceLog(`Warning: dropping non-string gold label of ${context}`, { label });
      continue;
    }
    labels.add(label.trim());
  }
  return labels;
}

function parseDocument(filePath: string, content: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  try {
    if (ext === ".yaml" || ext === ".yml") {
      return parse(content);
    }
    return JSON.parse(content);
  } catch (error) {
    throw new CorpusLoadError(`Invalid data format in file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

function toItem(record: Record<string, unknown>, index: number, fields: CorpusFields, filePath: string): CorpusItem {
  const id = record[fields.id];
  const text = record[fields.text];
  if (typeof id !== "string" && typeof id !== "number") {
    throw new CorpusLoadError(`Record ${index} in ${filePath} has no "${fields.id}" field`);
  }
  if (typeof text !== "string") {
    throw new CorpusLoadError(`Record ${index} in ${filePath} has no "${fields.text}" text`);
  }
  return {
    id: String(id),
    inputText: text,
    goldLabels: decodeGoldLabels(record[fields.labels], `record ${id}`),
  };
}

/** loads a JSON or YAML file holding an array of labeled records */
export function corpusFileLoader(filePath: string, fields: Partial<CorpusFields> = {}): CorpusLoader {
  const keys = { ...DEFAULT_FIELDS, ...fields };

  return async (): Promise<CorpusItem[]> => {
    traceLog(`Loading validation data from ${filePath}`);

    let content: string;
    try {
      content = await readFile(filePath, "utf8");
    } catch (error) {
      throw new CorpusLoadError(`Could not read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const doc = documentSchema.safeParse(parseDocument(filePath, content));
    if (!doc.success) {
      throw new CorpusLoadError(`Expected an array of records in ${filePath}`, { cause: doc.error });
    }

    const items = doc.data.map((record, index) => toItem(record, index, keys, filePath));
    traceLog(`Loaded ${items.length} items`);
    return items;
  };
}
