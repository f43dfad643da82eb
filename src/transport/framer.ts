import { MAX_BUFFER_SIZE } from "../shared/constants.js";
import { MessageDecodeError } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { isJsonObject } from "../protocols/control/codec.js";

/**
 * Reassembles JSON objects from stdout chunks.
 *
 * The agent writes one object per line, but a pipe read can end anywhere and a
 * very long line may arrive in pieces. Pieces accumulate into one buffer that is
 * parsed speculatively after every append: a successful parse emits the object and
 * resets, a failed one waits for more input. A buffer that grows past the limit
 * without ever parsing is discarded and reported.
 */
export class JsonStreamFramer {
  private buffer = "";
  private readonly logger = componentLogger("framer");

  constructor(readonly maxBufferSize: number = MAX_BUFFER_SIZE) {}

  /** Objects completed by this chunk, in order. */
  push(chunk: string): Record<string, unknown>[] {
    const out: Record<string, unknown>[] = [];
    for (const piece of chunk.split("\n")) {
      if (piece.length === 0) continue;
      this.buffer += piece;
      if (this.buffer.trim().length === 0) {
        this.buffer = "";
        continue;
      }
      if (this.buffer.length > this.maxBufferSize) {
        const length = this.buffer.length;
        this.buffer = "";
        throw new MessageDecodeError(
          `JSON message exceeded maximum buffer size of ${this.maxBufferSize} characters`,
          length,
          this.maxBufferSize
        );
      }
      let value: unknown;
      try {
        value = JSON.parse(this.buffer);
      } catch {
        // incomplete object: keep accumulating
        continue;
      }
      this.buffer = "";
      if (isJsonObject(value)) {
        out.push(value);
      } else {
        this.logger.debug({ value }, "Dropping non-object JSON value");
      }
    }
    return out;
  }

  /** Characters currently held waiting for the rest of an object. */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = "";
  }
}
