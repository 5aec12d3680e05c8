import type { CallParams, Completion, ModelGateway, ReasoningEffort, StructuredParams } from "@/llm.ts";
import { type z, type ZodObject, type ZodRawShape } from "zod";

type Handler<P, R> = (params: P) => R | Promise<R>;

export interface RecordedCall {
  kind: "create" | "reason" | "structured";
  params: CallParams & { temperature?: number; reasoningEffort?: ReasoningEffort; formatName?: string };
}

function asCompletion(reply: string | Completion): Completion {
  return typeof reply === "string" ? { text: reply } : reply;
}

/**
 * In-process gateway for tests. Each call kind is answered by a handler; a
 * handler that throws stands in for a failed API call.
 */
export class FakeGateway implements ModelGateway {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly handlers: {
      create?: Handler<CallParams & { temperature?: number }, string | Completion>;
      reason?: Handler<CallParams & { reasoningEffort?: ReasoningEffort }, string | Completion>;
      structured?: Handler<CallParams & { formatName: string }, unknown>;
    } = {},
  ) {}

  async create(params: CallParams & { temperature?: number }): Promise<Completion> {
    this.calls.push({ kind: "create", params });
    if (!this.handlers.create) throw new Error("no create handler");
    return asCompletion(await this.handlers.create(params));
  }

  async reason(params: CallParams & { reasoningEffort?: ReasoningEffort }): Promise<Completion> {
    this.calls.push({ kind: "reason", params });
    if (!this.handlers.reason) throw new Error("no reason handler");
    return asCompletion(await this.handlers.reason(params));
  }

  async structured<T extends ZodRawShape>(params: StructuredParams<T>): Promise<z.infer<ZodObject<T>> | null> {
    this.calls.push({ kind: "structured", params });
    if (!this.handlers.structured) throw new Error("no structured handler");
    const value = await this.handlers.structured(params);
    if (value === null) {
      return null;
    }
    return params.format.parse(value);
  }
}

/** handler answering with the given replies in order, the last one repeating */
export function scripted<P>(...replies: Array<string | Error>): Handler<P, string> {
  let index = 0;
  return () => {
    const reply = replies[Math.min(index++, replies.length - 1)];
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  };
}

/** text of the last message sent in a call */
export function lastContent(params: CallParams): string {
  return params.input[params.input.length - 1]?.content ?? "";
}
