import type { JsonRpcId, JsonRpcResponse } from "./types.js";

/**
 * Build a JSON-RPC 2.0 error response.
 * @param errorOrData - If an Error, its message replaces `message`; any other defined value becomes `error.data`.
 */
export function jsonRpcError(
  id: JsonRpcId | null,
  code: number,
  message: string,
  errorOrData?: unknown
): JsonRpcResponse {
  const finalMessage = errorOrData instanceof Error ? errorOrData.message : message;
  const data = errorOrData !== undefined && !(errorOrData instanceof Error) ? errorOrData : undefined;
  return { jsonrpc: "2.0", id, error: { code, message: finalMessage, ...(data !== undefined && { data }) } };
}

export function jsonRpcResult(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}
