/**
 * Sanitizing Serializer — TypeScript
 *
 * Control characters, lone surrogates and similar bytes in a response can
 * break the client's JSON parser or desynchronize the line framing for the
 * rest of the session. Every outbound payload goes through sanitize() before
 * encoding, and the encoded text goes through scrubEncoded() before it is
 * written.
 */

// ─── Types ──────────────────────────────────────────────────────────────────

/** The closed set of shapes that leave the process */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Substituted for any value that cannot be sanitized */
export const UNPRINTABLE = '[unprintable]';

/** Substituted for a reference back to an enclosing object */
export const CIRCULAR = '[circular]';

// ─── Patterns ───────────────────────────────────────────────────────────────

/** C0 controls except TAB and LF, DEL, and C1 controls */
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;

/** Surrogate halves that are not part of a valid pair */
const LONE_SURROGATES = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/** Unicode noncharacters U+FFFE and U+FFFF */
const NONCHARACTERS = /[\uFFFE\uFFFF]/g;

/** Raw control bytes in already-encoded JSON text (valid JSON never has them) */
const ENCODED_CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]/g;

// ─── String Level ───────────────────────────────────────────────────────────

/**
 * Remove every control character except `\n` and `\t`, and every lone surrogate.
 *
 * @example
 * sanitizeString('Hello\u0000World\r\n') // 'HelloWorld\n'
 */
export function sanitizeString(text: string): string {
  try {
    return text.replace(CONTROL_CHARS, '').replace(LONE_SURROGATES, '').replace(NONCHARACTERS, '');
  } catch {
    return UNPRINTABLE;
  }
}

// ─── Structure Level ────────────────────────────────────────────────────────

function visit(value: unknown, ancestors: Set<object>): JsonValue {
  const kind = typeof value;
  switch (kind) {
    case 'string':
      return sanitizeString(String(value));
    case 'number':
      return Number.isFinite(value) ? Number(value) : null;
    case 'boolean':
      return value === true;
    case 'bigint':
      return String(value);
    case 'undefined':
    case 'function':
    case 'symbol':
      return null;
    case 'object':
      return visitObject(value, ancestors);
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

function visitObject(value: unknown, ancestors: Set<object>): JsonValue {
  if (value === null || typeof value !== 'object') return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (ancestors.has(value)) return CIRCULAR;

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => safeVisit(item, ancestors));
    }

    const result: { [key: string]: JsonValue } = {};
    for (const [key, member] of Object.entries(value)) {
      // JSON.stringify drops undefined members; keep the same shape
      if (member === undefined) continue;
      result[sanitizeString(key)] = safeVisit(member, ancestors);
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}

function safeVisit(value: unknown, ancestors: Set<object>): JsonValue {
  try {
    return visit(value, ancestors);
  } catch {
    return UNPRINTABLE;
  }
}

/**
 * Recursively sanitize every string leaf and mapping key of a value,
 * preserving structure, order and non-string scalars. Never throws.
 */
export function sanitize(value: unknown): JsonValue {
  return safeVisit(value, new Set<object>());
}

// ─── Encoded Text Level ─────────────────────────────────────────────────────

/**
 * Second pass over encoded JSON: drop raw control bytes and escape the
 * line/paragraph separators so a frame can never be split by a line reader.
 */
export function scrubEncoded(json: string): string {
  return json.replace(ENCODED_CONTROL_CHARS, '').replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029');
}

/** sanitize → JSON.stringify → scrubEncoded. Never throws. */
export function serialize(value: unknown): string {
  try {
    return scrubEncoded(JSON.stringify(sanitize(value)));
  } catch {
    return JSON.stringify(UNPRINTABLE);
  }
}
