/**
 * Stdio Transport Loop — TypeScript
 *
 * Reads newline-delimited JSON-RPC requests, hands each one to the
 * dispatcher and writes exactly one JSON line per answered request.
 *
 * Requests are handled strictly in order: the next line is not read until
 * the previous response has been written. Every line written is valid JSON;
 * when everything else fails the loop falls back to a hardcoded error frame.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { ErrorCodes, errorMessage } from './errors';
import { errorResponse, parseRequest } from './json-rpc';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse } from './json-rpc';
import { componentLogger } from './logger';
import { serialize } from './sanitize';

// ─── Types ──────────────────────────────────────────────────────────────────

/** Anything that can answer a parsed request; null means "no response" */
export interface RequestHandler {
  handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null>;
}

/** Counters reported when the input ends */
export interface TransportStats {
  requests: number;
  responses: number;
  notifications: number;
}

/** Written when no other frame can be produced */
export const FALLBACK_FRAME = '{"jsonrpc":"2.0","id":null,"error":{"code":-32603,"message":"Internal error"}}';

const log = componentLogger('transport');

// ─── Frames ─────────────────────────────────────────────────────────────────

/** Minimal error frame keyed by the given id, built without the serializer */
export function fallbackFrame(id: JsonRpcId): string {
  try {
    const key = id === null ? 'null' : JSON.stringify(id);
    return `{"jsonrpc":"2.0","id":${key},"error":{"code":${ErrorCodes.INTERNAL_ERROR},"message":"Internal error"}}`;
  } catch {
    return FALLBACK_FRAME;
  }
}

/** True when the text decodes to a single JSON object */
function isObjectFrame(text: string): boolean {
  try {
    const decoded: unknown = JSON.parse(text);
    return typeof decoded === 'object' && decoded !== null && !Array.isArray(decoded);
  } catch {
    return false;
  }
}

/**
 * Encode a response as one line of JSON.
 *
 * The encoded text is decoded again before it is trusted; anything that does
 * not round-trip to an object is replaced with the fallback frame.
 */
export function encodeFrame(response: JsonRpcResponse): string {
  const text = serialize(response);
  if (!text.includes('\n') && isObjectFrame(text)) {
    return text;
  }
  log.error('Encoded response failed validation; sending fallback frame', { id: response.id });
  return fallbackFrame(response.id);
}

// ─── Line Processing ────────────────────────────────────────────────────────

/**
 * Turn one trimmed, non-empty input line into the frame to write.
 *
 * Returns null for notifications. Never throws.
 */
export async function processLine(handler: RequestHandler, line: string, sequence: number): Promise<string | null> {
  const syntheticId = `error-${sequence}`;

  try {
    const parsed = parseRequest(line);
    if (!parsed.ok) {
      log.warn(`Rejected line ${sequence}: ${parsed.error.message}`);
      return encodeFrame(errorResponse(parsed.id ?? syntheticId, parsed.error));
    }

    const response = await handler.handleRequest(parsed.request);
    return response === null ? null : encodeFrame(response);
  } catch (err) {
    log.error(`Unhandled failure on line ${sequence}: ${errorMessage(err)}`);
    return fallbackFrame(syntheticId);
  }
}

function writeLine(output: Writable, frame: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${frame}\n`, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

// ─── Loop ───────────────────────────────────────────────────────────────────

/**
 * Serve requests from `input` until it ends.
 *
 * A per-request failure never ends the loop; only end of input, an input
 * stream error or an output write failure does. Output stream errors are
 * logged, never raised as uncaught exceptions.
 */
export async function serveLines(handler: RequestHandler, input: Readable, output: Writable): Promise<TransportStats> {
  const stats: TransportStats = { requests: 0, responses: 0, notifications: 0 };
  const lines = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  // Write failures end the loop through the write callback; the event is only logged,
  // and the listener stays since the stream may emit after the loop returns
  output.on('error', (err) => {
    log.warn(`Output stream error: ${err.message}`);
  });

  try {
    for await (const raw of lines) {
      const line = raw.trim();
      if (line.length === 0) continue;

      stats.requests++;
      log.debug(`Request ${stats.requests}: ${line.length} chars`);

      const frame = await processLine(handler, line, stats.requests);
      if (frame === null) {
        stats.notifications++;
        continue;
      }
      await writeLine(output, frame);
      stats.responses++;
    }
    log.debug('End of input, shutting down', { ...stats });
  } catch (err) {
    log.error(`Transport stopped: ${errorMessage(err)}`);
  } finally {
    lines.close();
  }

  return stats;
}
