import { describe, it, expect, afterEach } from "vitest";
import { ControlSession, type ControlSessionOptions } from "../../src/session/control-session.js";
import {
  CliConnectionError,
  ControlResponseError,
  ControlTimeoutError,
  UsageError,
} from "../../src/shared/errors.js";
import type { JsonObject } from "../../src/types.js";
import { FakeTransport, assistantRecord, resultRecord, tick, waitFor } from "./helpers.js";

const sessions: ControlSession[] = [];

function createSession(opts: Partial<ControlSessionOptions> = {}) {
  const transport = new FakeTransport();
  const session = new ControlSession({ transport, streaming: true, requestTimeoutMs: 1000, closeGraceMs: 50, ...opts });
  sessions.push(session);
  session.start();
  return { transport, session };
}

function success(requestId: string, response?: JsonObject): JsonObject {
  return {
    type: "control_response",
    response: { subtype: "success", request_id: requestId, ...(response && { response }) },
  };
}

function agentRequest(requestId: string, request: JsonObject): JsonObject {
  return { type: "control_request", request_id: requestId, request };
}

async function collect(iter: AsyncIterable<JsonObject>): Promise<JsonObject[]> {
  const out: JsonObject[] = [];
  for await (const item of iter) out.push(item);
  return out;
}

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((s) => s.close()));
});

describe("ControlSession", () => {
  describe("host-issued requests", () => {
    it("matches responses to requests regardless of arrival order", async () => {
      const { transport, session } = createSession();
      const first = session.sendControlRequest({ subtype: "set_model", model: "model-a" });
      const second = session.sendControlRequest({ subtype: "interrupt" });
      const third = session.sendControlRequest({ subtype: "set_permission_mode", mode: "plan" });
      await waitFor(() => transport.controlRequests().length === 3);

      const [r1, r2, r3] = transport.controlRequests();
      transport.push(success(r3.request_id, { n: 3 }));
      transport.push(success(r1.request_id, { n: 1 }));
      transport.push(success(r2.request_id, { n: 2 }));

      expect(await first).toEqual({ n: 1 });
      expect(await second).toEqual({ n: 2 });
      expect(await third).toEqual({ n: 3 });
    });

    it("writes control_request lines with sequential request ids", async () => {
      const { transport, session } = createSession();
      void session.sendControlRequest({ subtype: "interrupt" }).catch(() => undefined);
      void session.sendControlRequest({ subtype: "set_model", model: null }).catch(() => undefined);
      await waitFor(() => transport.controlRequests().length === 2);

      const [r1, r2] = transport.controlRequests();
      expect(r1.request_id).toMatch(/^req_1_[0-9a-f]{8}$/);
      expect(r2.request_id).toMatch(/^req_2_[0-9a-f]{8}$/);
      expect(r1.request).toEqual({ subtype: "interrupt" });
      expect(r2.request).toEqual({ subtype: "set_model", model: null });
    });

    it("resolves to an empty object when the response carries no payload", async () => {
      const { transport, session } = createSession();
      const pending = session.interrupt();
      await waitFor(() => transport.controlRequests().length === 1);
      transport.push(success(transport.controlRequests()[0].request_id));
      await expect(pending).resolves.toBeUndefined();

      const next = session.sendControlRequest({ subtype: "interrupt" });
      await waitFor(() => transport.controlRequests().length === 2);
      transport.push(success(transport.controlRequests()[1].request_id));
      expect(await next).toEqual({});
    });

    it("times out one request without affecting another", async () => {
      const { transport, session } = createSession({ requestTimeoutMs: 50 });
      const slow = session.sendControlRequest({ subtype: "interrupt" }).catch((err: unknown) => err);
      const fast = session.sendControlRequest({ subtype: "set_model", model: "m" });
      await waitFor(() => transport.controlRequests().length === 2);
      const [slowReq, fastReq] = transport.controlRequests();
      transport.push(success(fastReq.request_id, { ok: true }));

      expect(await fast).toEqual({ ok: true });
      const err = await slow;
      expect(err).toBeInstanceOf(ControlTimeoutError);
      expect(err).toMatchObject({ subtype: "interrupt", message: "Control request timeout: interrupt" });

      // a late answer is dropped and the session keeps working
      transport.push(success(slowReq.request_id, { late: true }));
      const after = session.sendControlRequest({ subtype: "interrupt" });
      await waitFor(() => transport.controlRequests().length === 3);
      transport.push(success(transport.controlRequests()[2].request_id, { after: true }));
      expect(await after).toEqual({ after: true });
    });

    it("rejects with the agent's message on an error response", async () => {
      const { transport, session } = createSession();
      const pending = session.setPermissionMode("plan");
      await waitFor(() => transport.controlRequests().length === 1);
      const { request_id } = transport.controlRequests()[0];
      transport.push({
        type: "control_response",
        response: { subtype: "error", request_id, error: "mode not allowed" },
      });

      const err = await pending.catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ControlResponseError);
      expect(err).toMatchObject({ message: "mode not allowed", requestId: request_id });
    });

    it("refuses control requests outside streaming mode", async () => {
      const { transport, session } = createSession({ streaming: false });
      await expect(session.sendControlRequest({ subtype: "interrupt" })).rejects.toBeInstanceOf(UsageError);
      expect(await session.initialize()).toBeNull();
      expect(transport.raw).toBe("");
    });
  });

  describe("initialize", () => {
    it("registers hook callbacks and keeps the agent's response", async () => {
      const hook = async () => ({});
      const { transport, session } = createSession({
        hooks: {
          PreToolUse: [{ matcher: "Bash", hooks: [hook, hook] }],
          Stop: [{ hooks: [hook], timeout: 30 }],
        },
      });
      const init = session.initialize();
      await waitFor(() => transport.controlRequests().length === 1);
      const { request_id, request } = transport.controlRequests()[0];
      expect(request).toEqual({
        subtype: "initialize",
        hooks: {
          PreToolUse: [{ matcher: "Bash", hookCallbackIds: ["hook_0", "hook_1"] }],
          Stop: [{ matcher: null, hookCallbackIds: ["hook_2"], timeout: 30 }],
        },
      });
      transport.push(success(request_id, { commands: [], output_style: "default" }));

      expect(await init).toEqual({ commands: [], output_style: "default" });
      expect(session.getServerInfo()).toEqual({ commands: [], output_style: "default" });
      expect(session.lifecycle).toBe("initialized");
    });

    it("sends null hooks when none are configured", async () => {
      const { transport, session } = createSession();
      const init = session.initialize();
      await waitFor(() => transport.controlRequests().length === 1);
      expect(transport.controlRequests()[0].request).toEqual({ subtype: "initialize", hooks: null });
      transport.push(success(transport.controlRequests()[0].request_id, {}));
      await init;
    });
  });

  describe("message routing", () => {
    it("queues conversation messages and consumes control traffic", async () => {
      const { transport, session } = createSession();
      transport.push(assistantRecord("hello"));
      transport.push(success("req_99_deadbeef", { stray: true }));
      transport.push({ type: "keep_alive" });
      transport.push(resultRecord());
      transport.inbound.end();

      const messages = await collect(session.receiveMessages());
      expect(messages.map((m) => m.type)).toEqual(["assistant", "result"]);
    });

    it("surfaces a read failure once, then ends", async () => {
      const { transport, session } = createSession();
      transport.push(assistantRecord("partial"));
      transport.inbound.fail(new Error("Command failed with exit code 1"));

      const seen: JsonObject[] = [];
      const err = await (async () => {
        for await (const m of session.receiveMessages()) seen.push(m);
      })().catch((e: unknown) => e);
      expect(seen).toHaveLength(1);
      expect(err).toMatchObject({ message: "Command failed with exit code 1" });
      expect(await collect(session.receiveMessages())).toEqual([]);
    });

    it("fails pending requests when the agent stops writing", async () => {
      const { transport, session } = createSession();
      const pending = session.interrupt().catch((e: unknown) => e);
      await waitFor(() => transport.controlRequests().length === 1);
      transport.inbound.end();
      const err = await pending;
      expect(err).toBeInstanceOf(CliConnectionError);
      expect(err).toMatchObject({ message: "Agent process ended before responding" });
    });
  });

  describe("agent-issued requests", () => {
    it("answers a hook callback with the renamed output", async () => {
      const { transport, session } = createSession({
        hooks: {
          PreToolUse: [
            {
              matcher: "Bash",
              hooks: [
                async (input) => ({
                  continue_: false,
                  decision: "block",
                  reason: `blocked ${String(input.tool_name)}`,
                  hookSpecificOutput: { hookEventName: "PreToolUse", permissionDecision: "deny" },
                }),
              ],
            },
          ],
        },
      });
      const init = session.initialize();
      await waitFor(() => transport.controlRequests().length === 1);
      transport.push(success(transport.controlRequests()[0].request_id, {}));
      await init;

      transport.push(
        agentRequest("cli_1", {
          subtype: "hook_callback",
          callback_id: "hook_0",
          input: { hook_event_name: "PreToolUse", tool_name: "Bash", tool_input: { command: "rm -rf /" } },
          tool_use_id: "toolu_1",
        })
      );
      await waitFor(() => transport.responseFor("cli_1") !== undefined);

      expect(transport.responseFor("cli_1")).toEqual({
        subtype: "success",
        request_id: "cli_1",
        response: {
          continue: false,
          decision: "block",
          reason: "blocked Bash",
          hookSpecificOutput: { hookEventName: "PreToolUse", permissionDecision: "deny" },
        },
      });
    });

    it("answers a PreToolUse hook with one deny response and queues nothing", async () => {
      const { transport, session } = createSession({
        hooks: {
          PreToolUse: [
            {
              hooks: [
                async () => ({
                  hookSpecificOutput: {
                    hookEventName: "PreToolUse",
                    permissionDecision: "deny",
                    permissionDecisionReason: "Bash is disabled",
                  },
                }),
              ],
            },
          ],
        },
      });
      const init = session.initialize();
      await waitFor(() => transport.controlRequests().length === 1);
      expect(transport.controlRequests()[0].request).toEqual({
        subtype: "initialize",
        hooks: { PreToolUse: [{ matcher: null, hookCallbackIds: ["hook_0"] }] },
      });
      transport.push(success(transport.controlRequests()[0].request_id, {}));
      await init;

      transport.push(agentRequest("cli_1", { subtype: "hook_callback", callback_id: "hook_0", input: { tool_name: "Bash" } }));
      await waitFor(() => transport.responseFor("cli_1") !== undefined);

      expect(transport.written.filter((r) => r.type === "control_response")).toEqual([
        {
          type: "control_response",
          response: {
            subtype: "success",
            request_id: "cli_1",
            response: {
              hookSpecificOutput: {
                hookEventName: "PreToolUse",
                permissionDecision: "deny",
                permissionDecisionReason: "Bash is disabled",
              },
            },
          },
        },
      ]);
      await transport.close();
      expect(await collect(session.receiveMessages())).toEqual([]);
    });

    it("answers a control request it cannot decode with an error", async () => {
      const { transport } = createSession();
      transport.push({ type: "control_request", request_id: "cli_9", request: { tool_name: "Bash" } });
      await waitFor(() => transport.responseFor("cli_9") !== undefined);

      const response = transport.responseFor("cli_9");
      expect(response).toMatchObject({ subtype: "error", request_id: "cli_9" });
      expect(response?.error).toEqual(expect.stringMatching(/^Invalid control request: /));
    });

    it("drops a control request without an id", async () => {
      const { transport, session } = createSession();
      transport.push({ type: "control_request", request: { subtype: "can_use_tool" } });
      transport.push(assistantRecord("after"));
      const first = await session.receiveMessages().next();
      expect(first.value).toMatchObject({ type: "assistant" });
      expect(transport.written).toEqual([]);
    });

    it("keeps serving requests after a callback throws", async () => {
      let calls = 0;
      const { transport, session } = createSession({
        canUseTool: async (toolName) => {
          calls += 1;
          if (calls === 1) throw new Error("permission store unavailable");
          return { behavior: "allow", updatedInput: { tool: toolName } };
        },
      });
      const request = { subtype: "can_use_tool", tool_name: "Write", input: { path: "a.txt" } };
      transport.push(agentRequest("cli_1", request));
      await waitFor(() => transport.responseFor("cli_1") !== undefined);
      transport.push(agentRequest("cli_2", request));
      await waitFor(() => transport.responseFor("cli_2") !== undefined);

      expect(transport.responseFor("cli_1")).toEqual({
        subtype: "error",
        request_id: "cli_1",
        error: "permission store unavailable",
      });
      expect(transport.responseFor("cli_2")).toEqual({
        subtype: "success",
        request_id: "cli_2",
        response: { behavior: "allow", updatedInput: { tool: "Write" } },
      });
    });

    it("aborts the callback signal on control_cancel_request", async () => {
      let signal: AbortSignal | undefined;
      const { transport } = createSession({
        canUseTool: (_tool, _input, ctx) => {
          signal = ctx.signal;
          return new Promise((resolve) => {
            ctx.signal.addEventListener("abort", () => resolve({ behavior: "deny", message: "cancelled" }));
          });
        },
      });
      transport.push(agentRequest("cli_7", { subtype: "can_use_tool", tool_name: "Bash", input: {} }));
      await waitFor(() => signal !== undefined);
      expect(signal?.aborted).toBe(false);

      transport.push({ type: "control_cancel_request", request_id: "cli_7" });
      await waitFor(() => transport.responseFor("cli_7") !== undefined);
      expect(signal?.aborted).toBe(true);
      expect(transport.responseFor("cli_7")).toEqual({
        subtype: "success",
        request_id: "cli_7",
        response: { behavior: "deny", message: "cancelled" },
      });
    });

    it("does not block the read loop while a callback runs", async () => {
      let release: () => void = () => undefined;
      const { transport, session } = createSession({
        canUseTool: () =>
          new Promise((resolve) => {
            release = () => resolve({ behavior: "allow" });
          }),
      });
      transport.push(agentRequest("cli_1", { subtype: "can_use_tool", tool_name: "Read", input: { file: "x" } }));
      transport.push(assistantRecord("still flowing"));

      const iter = session.receiveMessages();
      const first = await iter.next();
      expect(first.value).toMatchObject({ type: "assistant" });
      expect(transport.responseFor("cli_1")).toBeUndefined();

      release();
      await waitFor(() => transport.responseFor("cli_1") !== undefined);
      expect(transport.responseFor("cli_1")).toMatchObject({
        response: { behavior: "allow", updatedInput: { file: "x" } },
      });
      await iter.return(undefined);
    });
  });

  describe("input streaming", () => {
    const userMessage = (text: string): JsonObject => ({
      type: "user",
      message: { role: "user", content: text },
      parent_tool_use_id: null,
      session_id: "default",
    });

    it("holds stdin open until the first result when callbacks are registered", async () => {
      const { transport, session } = createSession({ canUseTool: async () => ({ behavior: "allow" }) });
      const input = session.streamInput([userMessage("first"), userMessage("second")]);
      await waitFor(() => transport.written.length === 2);
      expect(transport.written).toEqual([userMessage("first"), userMessage("second")]);

      await tick();
      expect(transport.inputEnded).toBe(false);

      transport.push(resultRecord());
      await input;
      expect(transport.inputEnded).toBe(true);
    });

    it("ends input right after the last message without callbacks", async () => {
      const { transport, session } = createSession();
      await session.streamInput([userMessage("only")]);
      expect(transport.inputEnded).toBe(true);
      expect(transport.written).toEqual([userMessage("only")]);
    });

    it("never interleaves concurrent writes", async () => {
      const { transport, session } = createSession();
      transport.slowWrites = true;
      await Promise.all(
        Array.from({ length: 10 }, (_, i) => session.sendMessage({ type: "user", index: i, pad: "x".repeat(40) }))
      );
      expect(transport.written.map((r) => r.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });
  });

  describe("close", () => {
    it("is idempotent and safe before start", async () => {
      const transport = new FakeTransport();
      const session = new ControlSession({ transport, streaming: true });
      await session.close();
      await session.close();
      expect(transport.closeCount).toBe(1);
      expect(session.lifecycle).toBe("closed");
    });

    it("rejects pending requests and refuses new ones", async () => {
      const { transport, session } = createSession();
      const pending = session.interrupt().catch((e: unknown) => e);
      await waitFor(() => transport.controlRequests().length === 1);

      await Promise.all([session.close(), session.close()]);
      const err = await pending;
      expect(err).toBeInstanceOf(CliConnectionError);
      expect(err).toMatchObject({ message: "Session closed" });
      expect(transport.closeCount).toBe(1);
      await expect(session.interrupt()).rejects.toBeInstanceOf(CliConnectionError);
      await expect(session.sendMessage({ type: "user" })).rejects.toBeInstanceOf(CliConnectionError);
    });

    it("rejects a request closed while its write is still in flight without an unhandled rejection", async () => {
      const unhandled: unknown[] = [];
      const onUnhandled = (reason: unknown) => unhandled.push(reason);
      process.on("unhandledRejection", onUnhandled);
      try {
        const { transport, session } = createSession();
        transport.writeDelayMs = 30;
        const pending = session.interrupt().catch((e: unknown) => e);
        await new Promise((r) => setTimeout(r, 5));
        await session.close();

        const err = await pending;
        expect(err).toBeInstanceOf(CliConnectionError);
        expect(err).toMatchObject({ message: "Session closed" });
        await new Promise((r) => setTimeout(r, 20));
        expect(unhandled).toEqual([]);
      } finally {
        process.off("unhandledRejection", onUnhandled);
      }
    });

    it("stops waiting on an input stream that never yields again", async () => {
      const { transport, session } = createSession();
      async function* stalled(): AsyncGenerator<JsonObject> {
        yield { type: "user", message: { role: "user", content: "first" } };
        await new Promise(() => undefined);
      }
      const input = session.streamInput(stalled());
      await waitFor(() => transport.written.length === 1);

      await session.close();
      await expect(input).resolves.toBeUndefined();
      expect(transport.inputEnded).toBe(false);
    });

    it("lets running callbacks finish within the grace period", async () => {
      const { transport, session } = createSession({
        closeGraceMs: 1000,
        canUseTool: async () => {
          await new Promise((r) => setTimeout(r, 20));
          return { behavior: "deny", message: "no" };
        },
      });
      transport.push(agentRequest("cli_1", { subtype: "can_use_tool", tool_name: "Bash", input: {} }));
      await tick();
      await session.close();
      expect(transport.responseFor("cli_1")).toEqual({
        subtype: "success",
        request_id: "cli_1",
        response: { behavior: "deny", message: "no" },
      });
    });

    it("aborts callbacks still running when the grace period ends", async () => {
      let signal: AbortSignal | undefined;
      const { transport, session } = createSession({
        closeGraceMs: 20,
        canUseTool: (_tool, _input, ctx) => {
          signal = ctx.signal;
          return new Promise(() => undefined);
        },
      });
      transport.push(agentRequest("cli_1", { subtype: "can_use_tool", tool_name: "Bash", input: {} }));
      await waitFor(() => signal !== undefined);
      await session.close();
      expect(signal?.aborted).toBe(true);
      expect(transport.closeCount).toBe(1);
    });
  });
});
