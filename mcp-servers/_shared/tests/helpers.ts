/**
 * Test helpers for the shared MCP layer.
 */

import { PassThrough } from 'stream';
import { successResponse } from '../ts/json-rpc';
import type { JsonRpcRequest, JsonRpcResponse } from '../ts/json-rpc';
import { serveLines } from '../ts/transport';
import type { RequestHandler, TransportStats } from '../ts/transport';

/** Feed `input` through the stdio loop and collect every line written */
export async function runTransport(
  handler: RequestHandler,
  input: string,
): Promise<{ frames: string[]; stats: TransportStats }> {
  const source = new PassThrough();
  const sink = new PassThrough();
  const chunks: string[] = [];
  sink.on('data', (chunk: Buffer | string) => chunks.push(chunk.toString()));

  source.end(input);
  const stats = await serveLines(handler, source, sink);
  await new Promise((resolve) => setImmediate(resolve));

  const frames = chunks
    .join('')
    .split('\n')
    .filter((line) => line.length > 0);
  return { frames, stats };
}

/**
 * Answers every request with `{ method }` and ignores notifications.
 * Records the methods it saw, in order.
 */
export class EchoHandler implements RequestHandler {
  readonly seen: string[] = [];

  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    this.seen.push(request.method);
    if (request.id === null) return null;
    return successResponse(request.id, { method: request.method, ...request.params });
  }
}
