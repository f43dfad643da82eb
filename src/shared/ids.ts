import { randomBytes } from "node:crypto";

/**
 * Request ids are `req_{counter}_{random hex}`: the counter orders requests within
 * one session, the suffix keeps ids distinct across reconnects.
 */
export function createRequestIdGenerator(prefix = "req"): () => string {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}_${counter}_${randomBytes(4).toString("hex")}`;
  };
}

export function createCallbackIdGenerator(prefix = "hook"): () => string {
  let next = 0;
  return () => `${prefix}_${next++}`;
}
