import type { PromptDocument } from "@/types.ts";

/** utility function for consistent trace logging */
export function traceLog(message: string, data?: unknown) {
  const timestamp = new Date().toISOString().slice(11, 23);
  console.log(`[${timestamp}] ${message}`);
  if (data !== undefined) {
    console.log(`  └─ ${JSON.stringify(data, null, 2)}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function withBackoff<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  baseDelay = 1000,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries) {
        break;
      }

      traceLog("An error occurred, retrying with backoff", {
        attempt,
        error: errorMessage(error),
      });

      // exponential backoff with jitter
      const delay = baseDelay * Math.pow(2, attempt) + Math.random() * 1000;
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

/**
 * Parses a flat list of quoted strings such as `['BERT', "GPT-4"]`.
 * Returns null for anything else, including lists holding numbers or nested lists.
 */
export function parseListLiteral(text: string): string[] | null {
  const src = text.trim();
  if (!src.startsWith("[") || !src.endsWith("]")) {
    return null;
  }

  const end = src.length - 1;
  const values: string[] = [];
  let i = 1;
  const skipSpace = () => {
    while (i < end && /\s/.test(src[i])) i++;
  };

  skipSpace();
  while (i < end) {
    const quote = src[i];
    if (quote !== "'" && quote !== '"') {
      return null;
    }
    i++;

    let value = "";
    let closed = false;
    while (i < end) {
      const ch = src[i];
      if (ch === "\\") {
        if (i + 1 >= end) return null;
        const next = src[i + 1];
        value += ESCAPES[next] ?? next;
        i += 2;
        continue;
      }
      i++;
      if (ch === quote) {
        closed = true;
        break;
      }
      value += ch;
    }
    if (!closed) {
      return null;
    }
    values.push(value);

    skipSpace();
    if (i === end) break;
    if (src[i] !== ",") {
      return null;
    }
    i++;
    skipSpace();
  }

  return values;
}

export function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** labels as they are shown to the models, e.g. `["BERT", "NA"]` */
export function formatLabels(labels: Iterable<string>): string {
  return JSON.stringify([...labels]);
}

export const INSTRUCTIONS_OPEN = "<instructions>";
export const INSTRUCTIONS_CLOSE = "</instructions>";

/**
 * Splits a prompt around its `<instructions>` region. The tags themselves are
 * not part of any field; `renderPrompt` puts them back.
 */
export function promptBuilder(text: string): PromptDocument {
  const start = text.indexOf(INSTRUCTIONS_OPEN);
  const end = text.indexOf(INSTRUCTIONS_CLOSE, start + INSTRUCTIONS_OPEN.length);
  if (start < 0 || end < 0) {
    throw new Error(`Prompt has no ${INSTRUCTIONS_OPEN}...${INSTRUCTIONS_CLOSE} region`);
  }
  return {
    preamble: text.slice(0, start),
    instructions: text.slice(start + INSTRUCTIONS_OPEN.length, end),
    postamble: text.slice(end + INSTRUCTIONS_CLOSE.length),
  };
}

export function renderPrompt(prompt: PromptDocument): string {
  return `${prompt.preamble}${INSTRUCTIONS_OPEN}${prompt.instructions}${INSTRUCTIONS_CLOSE}${prompt.postamble}`;
}
