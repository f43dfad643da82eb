import { parseMessage, type Message } from "../protocols/messages.js";
import { ControlSession } from "../session/control-session.js";
import { CLIENT_ENTRYPOINT } from "../shared/constants.js";
import { CliConnectionError } from "../shared/errors.js";
import { SubprocessTransport } from "../transport/subprocess.js";
import type { Transport } from "../transport/types.js";
import type { AgentOptions, JsonObject, PermissionMode } from "../types.js";
import { validateOptions } from "./options.js";
import type { Prompt } from "./query.js";

/**
 * Interactive, multi-turn connection to the agent. Stdin stays open between turns,
 * so follow-up prompts, interrupts and mode changes can be sent at any time.
 *
 * @example
 * const client = new AgentClient({ permissionMode: "acceptEdits" });
 * await client.connect();
 * await client.query("List the files in this directory");
 * for await (const message of client.receiveResponse()) console.log(message);
 * await client.disconnect();
 */
export class AgentClient {
  private session: ControlSession | null = null;
  private input: Promise<void> | null = null;

  constructor(
    private readonly options: AgentOptions = {},
    private readonly transport?: Transport
  ) {}

  /** Starts the agent and performs the `initialize` handshake. */
  async connect(prompt?: Prompt): Promise<void> {
    if (this.session) return;
    validateOptions(this.options, true);

    const pipe =
      this.transport ??
      new SubprocessTransport({
        prompt: null,
        options: { ...this.options, entrypoint: this.options.entrypoint ?? CLIENT_ENTRYPOINT },
      });
    await pipe.connect();

    const session = new ControlSession({
      transport: pipe,
      streaming: true,
      canUseTool: this.options.canUseTool,
      hooks: this.options.hooks,
      mcpServers: this.options.mcpServers,
      requestTimeoutMs: this.options.requestTimeoutMs,
      closeGraceMs: this.options.closeGraceMs,
    });
    this.session = session;
    try {
      session.start();
      await session.initialize();
    } catch (err) {
      this.session = null;
      await session.close();
      throw err;
    }

    if (typeof prompt === "string") {
      await this.query(prompt);
    } else if (prompt !== undefined) {
      this.input = session.streamInput(prompt);
    }
  }

  private requireSession(): ControlSession {
    if (!this.session) {
      throw new CliConnectionError("Not connected. Call connect() first.");
    }
    return this.session;
  }

  /** Sends a follow-up prompt in the given conversation. */
  async query(prompt: Prompt, sessionId = "default"): Promise<void> {
    const session = this.requireSession();
    if (typeof prompt === "string") {
      await session.sendMessage({
        type: "user",
        message: { role: "user", content: prompt },
        parent_tool_use_id: null,
        session_id: sessionId,
      });
      return;
    }
    for await (const record of prompt) {
      await session.sendMessage({ session_id: sessionId, ...record });
    }
  }

  /** Every message until the connection ends. */
  async *receiveMessages(): AsyncGenerator<Message> {
    const session = this.requireSession();
    for await (const raw of session.receiveMessages()) {
      const message = parseMessage(raw);
      if (message) yield message;
    }
  }

  /** Messages of the current turn, ending with (and including) its result. */
  async *receiveResponse(): AsyncGenerator<Message> {
    for await (const message of this.receiveMessages()) {
      yield message;
      if (message.type === "result") return;
    }
  }

  async interrupt(): Promise<void> {
    await this.requireSession().interrupt();
  }

  async setPermissionMode(mode: PermissionMode): Promise<void> {
    await this.requireSession().setPermissionMode(mode);
  }

  /** Switches the model for later turns; no argument restores the default. */
  async setModel(model?: string): Promise<void> {
    await this.requireSession().setModel(model);
  }

  /** The agent's `initialize` response (commands, output styles), once connected. */
  getServerInfo(): JsonObject | null {
    return this.session?.getServerInfo() ?? null;
  }

  async disconnect(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;
    await session.close();
    await this.input;
    this.input = null;
  }
}
