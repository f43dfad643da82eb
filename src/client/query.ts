import { parseMessage, type Message } from "../protocols/messages.js";
import { ControlSession } from "../session/control-session.js";
import { DEFAULT_ENTRYPOINT } from "../shared/constants.js";
import { SubprocessTransport } from "../transport/subprocess.js";
import type { Transport } from "../transport/types.js";
import type { AgentOptions, JsonObject } from "../types.js";
import { validateOptions } from "./options.js";

export type Prompt = string | AsyncIterable<JsonObject> | Iterable<JsonObject>;

export interface QueryParams {
  /** A string runs a single turn; an iterable streams user messages and enables callbacks. */
  prompt: Prompt;
  options?: AgentOptions;
  /** Overrides the subprocess transport, e.g. to reach a remote agent. */
  transport?: Transport;
}

/**
 * Runs one conversation and yields its messages. The agent process is closed when
 * the generator finishes, throws, or is abandoned with `return()`.
 *
 * @example
 * for await (const message of query({ prompt: "What is 2 + 2?" })) {
 *   if (message.type === "result") console.log(message.result);
 * }
 */
export async function* query({ prompt, options = {}, transport }: QueryParams): AsyncGenerator<Message> {
  const streaming = typeof prompt !== "string";
  validateOptions(options, streaming);

  const pipe =
    transport ??
    new SubprocessTransport({
      prompt: typeof prompt === "string" ? prompt : null,
      options: { ...options, entrypoint: options.entrypoint ?? DEFAULT_ENTRYPOINT },
    });
  await pipe.connect();

  const session = new ControlSession({
    transport: pipe,
    streaming,
    canUseTool: options.canUseTool,
    hooks: options.hooks,
    mcpServers: options.mcpServers,
    requestTimeoutMs: options.requestTimeoutMs,
    closeGraceMs: options.closeGraceMs,
  });

  let input: Promise<void> = Promise.resolve();
  try {
    session.start();
    if (typeof prompt !== "string") {
      await session.initialize();
      input = session.streamInput(prompt);
    }
    for await (const raw of session.receiveMessages()) {
      const message = parseMessage(raw);
      if (message) yield message;
    }
  } finally {
    await session.close();
    await input;
  }
}
