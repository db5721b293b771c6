/**
 * Shared Validation Utilities — TypeScript
 *
 * Pattern compilation and type guards used across MCP servers.
 */

// ─── Pattern Compilation ────────────────────────────────────────────────────

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

/** Escape a string so it matches itself literally inside a RegExp */
export function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * Compile a user-supplied regular expression.
 * Falls back to a literal match when the pattern is not a valid RegExp.
 */
export function compilePattern(pattern: string, flags = ''): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch {
    return new RegExp(escapeRegex(pattern), flags);
  }
}

/**
 * Compile a pattern that must match the whole input, not a substring.
 *
 * @example
 * compileFullMatch('.*\\.ts').test('index.ts')     // true
 * compileFullMatch('.*\\.ts').test('index.ts.bak') // false
 */
export function compileFullMatch(pattern: string, flags = ''): RegExp {
  const inner = compilePattern(pattern, flags);
  return new RegExp(`^(?:${inner.source})$`, flags);
}

// ─── Type Guards ────────────────────────────────────────────────────────────

/** Check if a value is a plain key/value object */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
