/**
 * Typed conversation messages, decoded from the agent's snake_case records.
 * Control records never get here: the session routes them before queueing.
 */
import { z } from "zod";
import { MessageParseError } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import type { JsonObject } from "../types.js";

// ── Content blocks ───────────────────────────────────────────────────

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ThinkingBlock {
  type: "thinking";
  thinking: string;
  signature: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: JsonObject;
}

export interface ToolResultBlock {
  type: "tool_result";
  toolUseId: string;
  content: string | JsonObject[] | null;
  isError: boolean | null;
}

export type ContentBlock = TextBlock | ThinkingBlock | ToolUseBlock | ToolResultBlock;

// ── Messages ─────────────────────────────────────────────────────────

export interface UserMessage {
  type: "user";
  content: string | ContentBlock[];
  parentToolUseId: string | null;
}

export interface AssistantMessage {
  type: "assistant";
  content: ContentBlock[];
  model: string;
  parentToolUseId: string | null;
}

export interface SystemMessage {
  type: "system";
  subtype: string;
  data: JsonObject;
}

export interface ResultMessage {
  type: "result";
  subtype: string;
  durationMs: number;
  durationApiMs: number;
  isError: boolean;
  numTurns: number;
  sessionId: string;
  totalCostUsd: number | null;
  usage: JsonObject | null;
  result: string | null;
}

/** Partial-message event, emitted when the agent streams deltas. */
export interface StreamEvent {
  type: "stream_event";
  uuid: string;
  sessionId: string;
  event: JsonObject;
  parentToolUseId: string | null;
}

export type Message = UserMessage | AssistantMessage | SystemMessage | ResultMessage | StreamEvent;

// ── Wire schemas ─────────────────────────────────────────────────────

const JsonObjectSchema = z.record(z.string(), z.unknown());

const TextBlockSchema = z.object({ type: z.literal("text"), text: z.string() });

const ThinkingBlockSchema = z.object({
  type: z.literal("thinking"),
  thinking: z.string(),
  signature: z.string().default(""),
});

const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: JsonObjectSchema,
});

const ToolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string(),
  content: z.union([z.string(), z.array(JsonObjectSchema)]).nullish(),
  is_error: z.boolean().nullish(),
});

const UserRecordSchema = z.object({
  message: z.object({ content: z.union([z.string(), z.array(z.unknown())]) }),
  parent_tool_use_id: z.string().nullish(),
});

const AssistantRecordSchema = z.object({
  message: z.object({ content: z.array(z.unknown()), model: z.string().default("") }),
  parent_tool_use_id: z.string().nullish(),
});

const SystemRecordSchema = z.object({ subtype: z.string() });

const ResultRecordSchema = z.object({
  subtype: z.string(),
  duration_ms: z.number(),
  duration_api_ms: z.number(),
  is_error: z.boolean(),
  num_turns: z.number(),
  session_id: z.string(),
  total_cost_usd: z.number().nullish(),
  usage: JsonObjectSchema.nullish(),
  result: z.string().nullish(),
});

const StreamEventRecordSchema = z.object({
  uuid: z.string(),
  session_id: z.string(),
  event: JsonObjectSchema,
  parent_tool_use_id: z.string().nullish(),
});

function decodeRecord<S extends z.ZodType>(schema: S, data: JsonObject, kind: string): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new MessageParseError(`Invalid ${kind} message: ${z.prettifyError(parsed.error)}`, data);
  }
  return parsed.data;
}

/** Decodes one content block; kinds this client does not model yield null. */
export function parseContentBlock(raw: unknown): ContentBlock | null {
  const kind = JsonObjectSchema.safeParse(raw);
  if (!kind.success) return null;
  switch (kind.data.type) {
    case "text":
      return decodeRecord(TextBlockSchema, kind.data, "text block");
    case "thinking":
      return decodeRecord(ThinkingBlockSchema, kind.data, "thinking block");
    case "tool_use":
      return decodeRecord(ToolUseBlockSchema, kind.data, "tool_use block");
    case "tool_result": {
      const block = decodeRecord(ToolResultBlockSchema, kind.data, "tool_result block");
      return {
        type: "tool_result",
        toolUseId: block.tool_use_id,
        content: block.content ?? null,
        isError: block.is_error ?? null,
      };
    }
    default:
      return null;
  }
}

function parseContentBlocks(raw: unknown[]): ContentBlock[] {
  return raw.map(parseContentBlock).filter((b): b is ContentBlock => b !== null);
}

/**
 * Decodes a raw record into a typed message. Unknown message types return null;
 * a known type with missing fields throws `MessageParseError`.
 */
export function parseMessage(data: JsonObject): Message | null {
  switch (data.type) {
    case "user": {
      const rec = decodeRecord(UserRecordSchema, data, "user");
      const { content } = rec.message;
      return {
        type: "user",
        content: typeof content === "string" ? content : parseContentBlocks(content),
        parentToolUseId: rec.parent_tool_use_id ?? null,
      };
    }
    case "assistant": {
      const rec = decodeRecord(AssistantRecordSchema, data, "assistant");
      return {
        type: "assistant",
        content: parseContentBlocks(rec.message.content),
        model: rec.message.model,
        parentToolUseId: rec.parent_tool_use_id ?? null,
      };
    }
    case "system": {
      const rec = decodeRecord(SystemRecordSchema, data, "system");
      return { type: "system", subtype: rec.subtype, data };
    }
    case "result": {
      const rec = decodeRecord(ResultRecordSchema, data, "result");
      return {
        type: "result",
        subtype: rec.subtype,
        durationMs: rec.duration_ms,
        durationApiMs: rec.duration_api_ms,
        isError: rec.is_error,
        numTurns: rec.num_turns,
        sessionId: rec.session_id,
        totalCostUsd: rec.total_cost_usd ?? null,
        usage: rec.usage ?? null,
        result: rec.result ?? null,
      };
    }
    case "stream_event": {
      const rec = decodeRecord(StreamEventRecordSchema, data, "stream_event");
      return {
        type: "stream_event",
        uuid: rec.uuid,
        sessionId: rec.session_id,
        event: rec.event,
        parentToolUseId: rec.parent_tool_use_id ?? null,
      };
    }
    default:
      componentLogger("messages").debug({ type: data.type }, "Skipping message of unknown type");
      return null;
  }
}
