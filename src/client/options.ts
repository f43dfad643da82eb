import { UsageError } from "../shared/errors.js";
import type { AgentOptions } from "../types.js";

/** Rejects option combinations the agent cannot honour. */
export function validateOptions(options: AgentOptions, streaming: boolean): void {
  if (options.canUseTool && options.permissionPromptToolName) {
    throw new UsageError(
      "canUseTool cannot be used with permissionPromptToolName. Use one or the other."
    );
  }
  if (!streaming && (options.canUseTool || options.hooks)) {
    throw new UsageError(
      "canUseTool and hooks require streaming mode. Pass the prompt as an iterable of messages instead of a string."
    );
  }
}
