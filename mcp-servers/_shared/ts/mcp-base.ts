/**
 * MCP Server Base Classes — TypeScript
 *
 * Shared foundation for MCP servers in this repository.
 * Implements protocol-version negotiation, tool registration and the
 * request dispatcher; transport.ts drives it over stdio.
 *
 * Usage:
 *   import { MCPServer, MCPTool, MCPResult } from '../../_shared/ts/mcp-base';
 */

import type { Readable, Writable } from 'stream';
import { z, ZodType, ZodTypeDef } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ErrorCodes, MethodNotFoundError, toErrorObject } from './errors';
import { errorResponse, isNotification, successResponse } from './json-rpc';
import type { JsonRpcRequest, JsonRpcResponse } from './json-rpc';
import { componentLogger } from './logger';
import { sanitizeString, serialize } from './sanitize';
import { isRecord } from './validation';
import { serveLines } from './transport';
import type { TransportStats } from './transport';

// ─── Types ──────────────────────────────────────────────────────────────────

/** Result returned by a tool execution */
export interface MCPResult<T = unknown> {
  success: boolean;
  data: T;
}

/** Tool definition interface — every tool implements this */
export interface MCPTool<TParams = unknown, TData = unknown> {
  /** Tool name as listed by tools/list */
  name: string;

  /** Human-readable description for the LLM */
  description: string;

  /** Zod schema for parameter validation; also the source of the JSON schema */
  paramsSchema: ZodType<TParams, ZodTypeDef, unknown>;

  /** Whether the tool changes the filesystem; mutating calls are audit-logged */
  mutating: boolean;

  /** Execute the tool with validated params */
  execute(params: TParams): Promise<MCPResult<TData>>;
}

/** JSON-schema-style description of a tool's arguments */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
}

/** Entry of the tools/list catalog */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/** Newest first */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = ['2025-06-18', '2025-03-26', '2024-11-05'];

// ─── Protocol Helpers ───────────────────────────────────────────────────────

const toolCallSchema = z.object({
  name: z.string().min(1, 'Tool name is required'),
  arguments: z.record(z.unknown()).nullish(),
});

/**
 * Convert a tool's zod schema into the catalog's input schema.
 *
 * zod-to-json-schema omits `required` for schemas without mandatory fields;
 * the catalog always carries the list.
 */
export function toInputSchema(schema: ZodType<unknown, ZodTypeDef, unknown>): ToolInputSchema {
  const json: unknown = zodToJsonSchema(schema, { target: 'openApi3', $refStrategy: 'none' });
  const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
  const required =
    isRecord(json) && Array.isArray(json.required)
      ? json.required.filter((entry): entry is string => typeof entry === 'string')
      : [];
  return { type: 'object', properties, required };
}

/** Pick the protocol version to answer `initialize` with */
export function negotiateProtocolVersion(
  requested: unknown,
  supported: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS,
): string {
  if (typeof requested === 'string' && supported.includes(requested)) {
    return requested;
  }
  return supported[0];
}

// ─── MCPServer ──────────────────────────────────────────────────────────────

export interface MCPServerConfig {
  name: string;
  version: string;
  tools: MCPTool[];
  /** Defaults to SUPPORTED_PROTOCOL_VERSIONS */
  protocolVersions?: readonly string[];
}

/**
 * Base MCP Server class.
 *
 * Registers tools, validates params, dispatches tool calls and maps every
 * failure onto a JSON-RPC error object. Holds no state between requests.
 *
 * Usage:
 *   const server = new MCPServer({ name: 'filesystem', version: '1.0.0', tools: [...] });
 *   await server.start();
 */
export class MCPServer {
  private readonly name: string;
  private readonly version: string;
  private readonly protocolVersions: readonly string[];
  private readonly tools: Map<string, MCPTool>;
  private readonly definitions: ToolDefinition[];
  private readonly log = componentLogger('dispatcher');

  constructor(config: MCPServerConfig) {
    this.name = config.name;
    this.version = config.version;
    this.protocolVersions =
      config.protocolVersions && config.protocolVersions.length > 0
        ? config.protocolVersions
        : SUPPORTED_PROTOCOL_VERSIONS;
    this.tools = new Map();

    for (const tool of config.tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }

    this.definitions = this.buildToolDefinitions();
  }

  /** Serve newline-delimited JSON-RPC until the input ends */
  start(input: Readable = process.stdin, output: Writable = process.stdout): Promise<TransportStats> {
    this.log.info(`${this.name} ${this.version} listening on stdio`, { tools: this.tools.size });
    return serveLines(this, input, output);
  }

  /** The static tool catalog */
  listTools(): ToolDefinition[] {
    return this.definitions;
  }

  /**
   * Build the tool definitions array for the tools/list response.
   *
   * Converts each registered tool's zod schema to JSON Schema once; the
   * catalog never changes at runtime.
   */
  private buildToolDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.paramsSchema),
    }));
  }

  /**
   * Handle one JSON-RPC request.
   *
   * Returns exactly one response, or null for a notification. Never throws.
   */
  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    this.log.debug(`-> ${request.method}`, { id: request.id });

    try {
      const result = await this.dispatch(request);
      if (isNotification(request)) return null;
      return successResponse(request.id, result);
    } catch (err) {
      const error = toErrorObject(err);
      if (error.code === ErrorCodes.INTERNAL_ERROR) {
        this.log.error(`${request.method} failed`, { id: request.id, error: error.message });
      } else {
        this.log.debug(`${request.method} rejected`, { id: request.id, code: error.code, error: error.message });
      }
      if (isNotification(request)) return null;
      return errorResponse(request.id, error);
    }
  }

  private async dispatch(request: JsonRpcRequest): Promise<Record<string, unknown>> {
    switch (request.method) {
      case 'initialize':
        return this.handleInitialize(request);
      case 'tools/list':
        return { tools: this.definitions };
      case 'tools/call':
        return this.handleToolCall(request);
      case 'ping':
        return {};
      default:
        if (isNotification(request) && request.method.startsWith('notifications/')) {
          this.log.debug(`Notification received: ${request.method}`);
          return {};
        }
        throw new MethodNotFoundError(`Unknown method: ${request.method}`);
    }
  }

  /** MCP initialization handshake */
  private handleInitialize(request: JsonRpcRequest): Record<string, unknown> {
    const requested = request.params.protocolVersion;
    const protocolVersion = negotiateProtocolVersion(requested, this.protocolVersions);
    if (protocolVersion !== requested) {
      this.log.info(`Client requested protocol ${String(requested)}, answering with ${protocolVersion}`);
    }

    return {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: { name: this.name, version: this.version },
    };
  }

  /** Handle a tools/call request */
  private async handleToolCall(request: JsonRpcRequest): Promise<Record<string, unknown>> {
    const { name, arguments: args } = toolCallSchema.parse(request.params);

    const tool = this.tools.get(name);
    if (!tool) {
      throw new MethodNotFoundError(`Unknown tool: ${name}`);
    }

    const params = tool.paramsSchema.parse(args ?? {});
    const started = Date.now();

    try {
      const result = await tool.execute(params);
      if (tool.mutating) {
        this.log.info(`[AUDIT] ${name} | ${result.success ? 'SUCCESS' : 'FAILED'} | duration=${Date.now() - started}ms`);
      }

      const text = typeof result.data === 'string' ? sanitizeString(result.data) : serialize(result.data);
      const envelope: Record<string, unknown> = { content: [{ type: 'text', text }] };
      if (!result.success) envelope.isError = true;
      return envelope;
    } catch (err) {
      if (tool.mutating) {
        this.log.warn(`[AUDIT] ${name} | ERROR | duration=${Date.now() - started}ms | error=${toErrorObject(err).message}`);
      }
      throw err;
    }
  }
}
