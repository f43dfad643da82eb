import { HOOK_EVENTS, type HookCallback, type HookConfig, type HookJsonOutput } from "../types.js";
import type { HookMatcherWire, HooksWireConfig } from "../protocols/control/types.js";

/**
 * User-side names that differ from the wire. `continue` and `async` are reserved in
 * some callers' languages, so both spellings are accepted; the escaped one wins.
 */
export const HOOK_FIELD_RENAMES: Readonly<Record<string, string>> = {
  continue_: "continue",
  async_: "async",
};

/** Applies the rename table once. The result never holds both spellings of a key. */
export function toWireHookOutput(output: HookJsonOutput): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(output)) {
    if (value === undefined) continue;
    const renamed = HOOK_FIELD_RENAMES[key];
    if (renamed !== undefined) {
      wire[renamed] = value;
    } else if (!escapedKeyPresent(output, key)) {
      wire[key] = value;
    }
  }
  return wire;
}

function escapedKeyPresent(output: HookJsonOutput, wireKey: string): boolean {
  return Object.entries(HOOK_FIELD_RENAMES).some(([escaped, target]) => target === wireKey && output[escaped] !== undefined);
}

export interface RegisteredHooks {
  wire: HooksWireConfig | null;
  callbacks: Map<string, HookCallback>;
}

/** Assigns a callback id to every hook and builds the `initialize` hooks payload. */
export function registerHooks(hooks: HookConfig | undefined, nextId: () => string): RegisteredHooks {
  const callbacks = new Map<string, HookCallback>();
  if (!hooks) return { wire: null, callbacks };

  const wire: HooksWireConfig = {};
  let registered = false;
  for (const event of HOOK_EVENTS) {
    const matchers = hooks[event];
    if (!matchers?.length) continue;
    wire[event] = matchers.map((m): HookMatcherWire => {
      const hookCallbackIds = m.hooks.map((callback) => {
        const id = nextId();
        callbacks.set(id, callback);
        return id;
      });
      return { matcher: m.matcher ?? null, hookCallbackIds, ...(m.timeout !== undefined && { timeout: m.timeout }) };
    });
    registered = true;
  }
  return { wire: registered ? wire : null, callbacks };
}
