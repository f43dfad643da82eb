/**
 * Byte pipe to the agent process. The control session owns one transport and is
 * its only reader and writer.
 */
export abstract class Transport {
  /** Starts the process (or opens the pipe). Must be called before anything else. */
  abstract connect(): Promise<void>;

  /** Writes one complete line. Callers serialize writes; implementations need not. */
  abstract write(data: string): Promise<void>;

  /** Every JSON object the agent writes, in order. Ends when stdout closes. */
  abstract readMessages(): AsyncIterable<Record<string, unknown>>;

  /** Closes stdin so the agent sees end of input. */
  abstract endInput(): Promise<void>;

  abstract close(): Promise<void>;

  abstract isReady(): boolean;
}
