/**
 * Error Taxonomy — TypeScript
 *
 * Typed errors raised by tool implementations and the single mapping from
 * those errors to JSON-RPC error objects. Only the dispatcher calls
 * toErrorObject(); lower layers throw and never format wire responses.
 */

import { ZodError } from 'zod';

// ─── Codes ──────────────────────────────────────────────────────────────────

/** Standard JSON-RPC codes plus the gateway's custom range */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // Custom codes
  SANDBOX_VIOLATION: -32001,
  NOT_FOUND: -32002,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** The `error` member of a JSON-RPC error response */
export interface ErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

// ─── Error Classes ──────────────────────────────────────────────────────────

/** Structured error for MCP tool failures */
export class MCPError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.data = data;
    this.name = 'MCPError';
  }
}

/** Malformed path string or malformed request */
export class FormatError extends MCPError {
  constructor(message: string, code: ErrorCode = ErrorCodes.INVALID_PARAMS) {
    super(code, message);
    this.name = 'FormatError';
  }
}

/** Sandbox violation: outside the allow-list, disallowed symlink, writes disabled */
export class SecurityError extends MCPError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(ErrorCodes.SANDBOX_VIOLATION, message, data);
    this.name = 'SecurityError';
  }
}

export class NotFoundError extends MCPError {
  constructor(message: string) {
    super(ErrorCodes.NOT_FOUND, message);
    this.name = 'NotFoundError';
  }
}

/** Wrong type, oversized file, file where a directory was expected, etc. */
export class InvalidArgumentError extends MCPError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_PARAMS, message);
    this.name = 'InvalidArgumentError';
  }
}

export class MethodNotFoundError extends MCPError {
  constructor(message: string) {
    super(ErrorCodes.METHOD_NOT_FOUND, message);
    this.name = 'MethodNotFoundError';
  }
}

export class InternalError extends MCPError {
  constructor(message: string) {
    super(ErrorCodes.INTERNAL_ERROR, message);
    this.name = 'InternalError';
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown';
}

/** Narrow a thrown value to a Node.js system error carrying an errno code */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Map any thrown value onto the error taxonomy.
 *
 * MCPError subclasses keep their own code; zod validation failures become
 * INVALID_PARAMS with the issue list attached; everything else is INTERNAL_ERROR.
 */
export function toErrorObject(err: unknown): ErrorObject {
  if (err instanceof MCPError) {
    return err.data ? { code: err.code, message: err.message, data: err.data } : { code: err.code, message: err.message };
  }

  if (err instanceof ZodError) {
    return {
      code: ErrorCodes.INVALID_PARAMS,
      message: `Invalid parameters: ${err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`,
      data: {
        issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      },
    };
  }

  return { code: ErrorCodes.INTERNAL_ERROR, message: `Internal error: ${errorMessage(err)}` };
}
