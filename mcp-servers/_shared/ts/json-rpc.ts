/**
 * JSON-RPC 2.0 Transport Utilities — TypeScript
 *
 * Low-level JSON-RPC message handling for MCP server communication.
 * Used by mcp-base.ts and transport.ts; typically not imported directly by
 * tool implementations.
 */

import { ErrorCodes } from './errors';
import type { ErrorObject } from './errors';
import { isRecord } from './validation';

// ─── JSON-RPC Types ─────────────────────────────────────────────────────────

/** `null` marks a notification */
export type JsonRpcId = string | number | null;

export interface JsonRpcMessage {
  jsonrpc: '2.0';
}

export interface JsonRpcRequest extends JsonRpcMessage {
  id: JsonRpcId;
  method: string;
  params: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse extends JsonRpcMessage {
  id: JsonRpcId;
  result: Record<string, unknown>;
}

export interface JsonRpcErrorResponse extends JsonRpcMessage {
  id: JsonRpcId;
  error: ErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/** Result of parsing one input line */
export type ParseOutcome =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; id: JsonRpcId | undefined; error: ErrorObject };

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Create a success response */
export function successResponse(id: JsonRpcId, result: Record<string, unknown>): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

/** Create an error response */
export function errorResponse(id: JsonRpcId, error: ErrorObject): JsonRpcErrorResponse {
  return { jsonrpc: '2.0', id, error };
}

/** True for a request that expects no response */
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === null;
}

function isId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

/**
 * Validate the shape of a decoded message.
 * A missing `jsonrpc` member is tolerated; a different version is not.
 */
export function toRequest(msg: unknown): ParseOutcome {
  if (!isRecord(msg)) {
    return { ok: false, id: undefined, error: { code: ErrorCodes.INVALID_REQUEST, message: 'Request must be a JSON object' } };
  }

  const id = msg.id === undefined ? null : msg.id;
  if (!isId(id)) {
    return { ok: false, id: undefined, error: { code: ErrorCodes.INVALID_REQUEST, message: 'Request id must be a string, number or null' } };
  }

  if (msg.jsonrpc !== undefined && msg.jsonrpc !== '2.0') {
    return { ok: false, id, error: { code: ErrorCodes.INVALID_REQUEST, message: 'Unsupported jsonrpc version' } };
  }

  if (typeof msg.method !== 'string' || msg.method.length === 0) {
    return { ok: false, id, error: { code: ErrorCodes.INVALID_REQUEST, message: 'Request method must be a non-empty string' } };
  }

  const params = msg.params === undefined || msg.params === null ? {} : msg.params;
  if (!isRecord(params)) {
    return { ok: false, id, error: { code: ErrorCodes.INVALID_REQUEST, message: 'Request params must be an object' } };
  }

  return { ok: true, request: { jsonrpc: '2.0', id, method: msg.method, params } };
}

/** Parse a raw line into a request, or the error describing why it is not one */
export function parseRequest(raw: string): ParseOutcome {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : 'Invalid JSON';
    return { ok: false, id: undefined, error: { code: ErrorCodes.PARSE_ERROR, message: `Parse error: ${detail}` } };
  }
  return toRequest(decoded);
}
