/**
 * Line codec for the control protocol: one JSON object per line, `\n` terminated.
 */
import type { HostControlRequest } from "./types.js";

interface ControlRequestLine {
  type: "control_request";
  request_id: string;
  request: HostControlRequest;
}

export type ControlResponseLine =
  | { type: "control_response"; response: { subtype: "success"; request_id: string; response: unknown } }
  | { type: "control_response"; response: { subtype: "error"; request_id: string; error: string } };

export function serializeLine(obj: unknown): string {
  return JSON.stringify(obj) + "\n";
}

export function controlRequest(requestId: string, request: HostControlRequest): ControlRequestLine {
  return { type: "control_request", request_id: requestId, request };
}

export function controlSuccess(requestId: string, response: unknown): ControlResponseLine {
  return { type: "control_response", response: { subtype: "success", request_id: requestId, response } };
}

export function controlError(requestId: string, error: string): ControlResponseLine {
  return { type: "control_response", response: { subtype: "error", request_id: requestId, error } };
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
