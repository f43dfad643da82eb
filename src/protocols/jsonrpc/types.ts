import { type } from "arktype";

export const JsonRpcIdSchema = type("string | number");
export type JsonRpcId = typeof JsonRpcIdSchema.infer;

export const JsonRpcMessageSchema = type({
  jsonrpc: "'2.0'",
  "id?": "string | number | null",
  method: "string",
  "params?": "unknown",
});

export type JsonRpcMessage = typeof JsonRpcMessageSchema.infer;

export const JSON_RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: "2.0"; id: JsonRpcId | null; result: unknown }
  | { jsonrpc: "2.0"; id: JsonRpcId | null; error: JsonRpcErrorObject };
