import { traceLog, withBackoff } from "@/utils.ts";
import OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import { type z, type ZodObject, type ZodRawShape } from "zod";

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export type ReasoningEffort = "low" | "medium" | "high";

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  cachedTokens: number;
}

export interface Completion {
  text: string;
  usage?: Usage;
}

export interface CallParams {
  model?: string;
  input: Message[];
  timeout?: number;
  maxRetries?: number;
}

export interface StructuredParams<T extends ZodRawShape> extends CallParams {
  format: ZodObject<T>;
  formatName: string;
  temperature?: number;
  reasoningEffort?: ReasoningEffort;
}

/**
 * Everything the optimizer needs from a hosted model. Components receive a
 * gateway instead of reaching for a shared client so tests can swap in a fake.
 */
export interface ModelGateway {
  /** free text completion at the given sampling temperature */
  create(params: CallParams & { temperature?: number }): Promise<Completion>;
  /** free text completion from a reasoning model */
  reason(params: CallParams & { reasoningEffort?: ReasoningEffort }): Promise<Completion>;
  /** schema constrained extraction, null when the model produced nothing usable */
  structured<T extends ZodRawShape>(params: StructuredParams<T>): Promise<z.infer<ZodObject<T>> | null>;
}

export function cacheHitRatio(usage: Usage): number {
  return usage.inputTokens > 0 ? usage.cachedTokens / usage.inputTokens : 0;
}

/** logs token counts and the share of input tokens served from the prompt cache */
export function traceUsage(label: string, usage: Usage | undefined) {
  if (usage) {
    traceLog(label, { ...usage, cacheHitRatio: cacheHitRatio(usage) });
  }
}

function toUsage(usage: OpenAI.Responses.ResponseUsage | undefined): Usage | undefined {
  if (!usage) {
    return undefined;
  }
  return {
    inputTokens: usage.input_tokens,
    outputTokens: usage.output_tokens,
    cachedTokens: usage.input_tokens_details?.cached_tokens ?? 0,
  };
}

export class OpenAIGateway implements ModelGateway {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeout: number;
  private readonly maxRetries: number;

  constructor(opts: { client?: OpenAI; model?: string; timeout?: number; maxRetries?: number } = {}) {
    this.client = opts.client ?? new OpenAI();
    this.model = opts.model ?? "gpt-4o-mini";
    this.timeout = opts.timeout ?? 60_000;
    this.maxRetries = opts.maxRetries ?? 3;
  }

  create(params: CallParams & { temperature?: number }): Promise<Completion> {
    return this.complete(params, params.temperature);
  }

  reason(params: CallParams & { reasoningEffort?: ReasoningEffort }): Promise<Completion> {
    return this.complete(params, undefined, params.reasoningEffort ?? "low");
  }

  structured<T extends ZodRawShape>(params: StructuredParams<T>): Promise<z.infer<ZodObject<T>> | null> {
    return withBackoff(async () => {
      const req = this.request(params, params.temperature, params.reasoningEffort);
      req.text = { format: zodTextFormat(params.format, params.formatName) };

      const resp = await this.client.responses.parse(req, { timeout: params.timeout ?? this.timeout });
      const parsed = params.format.safeParse(resp.output_parsed);
      if (!parsed.success) {
        console.error("Failed to parse response from OpenAI", resp.output_text);
        return null;
      }
      return parsed.data;
    }, params.maxRetries ?? this.maxRetries);
  }

  private complete(params: CallParams, temperature?: number, effort?: ReasoningEffort): Promise<Completion> {
    return withBackoff(async () => {
      const req = this.request(params, temperature, effort);
      const resp = await this.client.responses.create(req, { timeout: params.timeout ?? this.timeout });
      return { text: resp.output_text, usage: toUsage(resp.usage) };
    }, params.maxRetries ?? this.maxRetries);
  }

  private request(
    params: CallParams,
    temperature?: number,
    effort?: ReasoningEffort,
  ): OpenAI.Responses.ResponseCreateParamsNonStreaming {
    const req: OpenAI.Responses.ResponseCreateParamsNonStreaming = {
      model: params.model ?? this.model,
      input: params.input,
    };
    if (temperature !== undefined) {
      req.temperature = temperature;
    }
    if (effort !== undefined) {
      req.reasoning = { effort };
    }
    return req;
  }
}
