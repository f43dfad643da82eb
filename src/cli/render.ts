import chalk from "chalk";
import type { ContentBlock, Message, ResultMessage } from "../protocols/messages.js";

const MAX_INPUT_PREVIEW = 120;

function preview(value: unknown): string {
  const json = JSON.stringify(value) ?? "";
  return json.length > MAX_INPUT_PREVIEW ? `${json.slice(0, MAX_INPUT_PREVIEW - 1)}…` : json;
}

function formatBlock(block: ContentBlock): string | null {
  switch (block.type) {
    case "text":
      return block.text;
    case "thinking":
      return chalk.dim(block.thinking);
    case "tool_use":
      return `${chalk.cyan(`→ ${block.name}`)} ${chalk.dim(preview(block.input))}`;
    case "tool_result":
      return block.isError ? chalk.red(`✗ tool ${block.toolUseId} failed`) : null;
  }
}

function formatBlocks(blocks: ContentBlock[]): string[] {
  return blocks.map(formatBlock).filter((line): line is string => line !== null);
}

export function formatResult(message: ResultMessage): string {
  const parts = [`${message.numTurns} turn${message.numTurns === 1 ? "" : "s"}`, `${message.durationMs} ms`];
  if (message.totalCostUsd !== null) parts.push(`$${message.totalCostUsd.toFixed(4)}`);
  const status = message.isError ? chalk.red(`✗ ${message.subtype}`) : chalk.green(`✓ ${message.subtype}`);
  return `${status} ${chalk.dim(`(${parts.join(", ")})`)}`;
}

/** Human-readable lines for one message; messages with nothing to show yield none. */
export function formatMessage(message: Message): string[] {
  switch (message.type) {
    case "assistant":
      return formatBlocks(message.content);
    case "user":
      // echoed prompts arrive as plain strings and are not shown
      return typeof message.content === "string" ? [] : formatBlocks(message.content);
    case "system":
      return [chalk.dim(`[${message.subtype}]`)];
    case "result":
      return [formatResult(message)];
    case "stream_event":
      return [];
  }
}
