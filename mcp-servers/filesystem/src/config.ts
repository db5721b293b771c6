/**
 * Filesystem gateway configuration.
 *
 * Built once at startup from the environment and command-line arguments,
 * validated with zod and frozen. Every component receives it explicitly;
 * nothing reads the environment after loadConfig() returns.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { PathNormalizer } from './paths';
import type { PathStyle } from './paths';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface GatewayConfig {
  /** Ordered, normalized, deduplicated */
  readonly allowedDirectories: readonly string[];
  readonly maxFileSizeMb: number;
  readonly writeEnabled: boolean;
  readonly symlinksAllowed: boolean;
  /** Base for relative paths; falls back to the first allowed directory */
  readonly activeProjectRoot: string | null;
  readonly pathStyle: PathStyle;
  readonly homeDirectory: string;
  readonly maxListResults: number;
  readonly maxSearchResults: number;
  readonly maxMatchesPerFile: number;
  readonly maxLineLength: number;
  /** Executables the script runner may start */
  readonly scriptCommands: readonly string[];
  readonly scriptTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ─── Defaults ───────────────────────────────────────────────────────────────

export const DEFAULTS = {
  maxFileSizeMb: 10,
  maxListResults: 100,
  maxSearchResults: 50,
  maxMatchesPerFile: 10,
  maxLineLength: 1000,
  scriptTimeoutMs: 30_000,
} as const;

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off']);

// ─── Environment Schema ─────────────────────────────────────────────────────

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function flag(fallback: boolean) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .refine((value) => TRUTHY.has(value) || FALSY.has(value), 'Expected true/false')
      .transform((value) => TRUTHY.has(value))
      .optional()
      .transform((value) => value ?? fallback),
  );
}

function positiveInt(fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
}

function positiveNumber(fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().positive().default(fallback));
}

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  FS_GATEWAY_ALLOWED_DIRS: optionalText,
  FS_GATEWAY_MAX_FILE_SIZE_MB: positiveNumber(DEFAULTS.maxFileSizeMb),
  FS_GATEWAY_ENABLE_WRITE: flag(false),
  FS_GATEWAY_ALLOW_SYMLINKS: flag(false),
  FS_GATEWAY_PROJECT_ROOT: optionalText,
  FS_GATEWAY_PATH_STYLE: z.preprocess(blankToUndefined, z.enum(['posix', 'windows']).optional()),
  FS_GATEWAY_MAX_LIST_RESULTS: positiveInt(DEFAULTS.maxListResults),
  FS_GATEWAY_MAX_SEARCH_RESULTS: positiveInt(DEFAULTS.maxSearchResults),
  FS_GATEWAY_MAX_MATCHES_PER_FILE: positiveInt(DEFAULTS.maxMatchesPerFile),
  FS_GATEWAY_MAX_LINE_LENGTH: positiveInt(DEFAULTS.maxLineLength),
  FS_GATEWAY_SCRIPT_COMMANDS: optionalText,
  FS_GATEWAY_SCRIPT_TIMEOUT_MS: positiveInt(DEFAULTS.scriptTimeoutMs),
});

// ─── Loading ────────────────────────────────────────────────────────────────

function splitList(value: string | undefined, separator: string): string[] {
  if (value === undefined) return [];
  return value
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Host path style: windows on win32, posix everywhere else */
export function defaultPathStyle(platform: NodeJS.Platform = process.platform): PathStyle {
  return platform === 'win32' ? 'windows' : 'posix';
}

/**
 * Build the immutable gateway configuration.
 *
 * Positional command-line arguments replace the allowed directories from
 * FS_GATEWAY_ALLOWED_DIRS. Throws ConfigError when validation fails or no
 * directory is allowed.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2),
  cwd: string = process.cwd(),
): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const vars = parsed.data;

  const pathStyle = vars.FS_GATEWAY_PATH_STYLE ?? defaultPathStyle();
  const homeDirectory = os.homedir();

  // Configured directories resolve relative to the project root, else the cwd
  const bootstrap = new PathNormalizer({
    style: pathStyle,
    homeDirectory,
    baseDirectory: cwd,
  });
  const activeProjectRoot =
    vars.FS_GATEWAY_PROJECT_ROOT === undefined ? null : bootstrap.normalize(vars.FS_GATEWAY_PROJECT_ROOT);
  const normalizer = new PathNormalizer({
    style: pathStyle,
    homeDirectory,
    baseDirectory: activeProjectRoot ?? cwd,
  });

  const positional = argv.filter((arg) => !arg.startsWith('-'));
  const rawDirectories = positional.length > 0 ? positional : splitList(vars.FS_GATEWAY_ALLOWED_DIRS, path.delimiter);

  const allowedDirectories: string[] = [];
  for (const raw of rawDirectories) {
    const normalized = normalizer.normalize(raw);
    if (!allowedDirectories.includes(normalized)) {
      allowedDirectories.push(normalized);
    }
  }

  if (allowedDirectories.length === 0) {
    throw new ConfigError(
      'No allowed directories configured. Pass directories as arguments or set FS_GATEWAY_ALLOWED_DIRS.',
    );
  }

  return freezeConfig({
    allowedDirectories,
    maxFileSizeMb: vars.FS_GATEWAY_MAX_FILE_SIZE_MB,
    writeEnabled: vars.FS_GATEWAY_ENABLE_WRITE,
    symlinksAllowed: vars.FS_GATEWAY_ALLOW_SYMLINKS,
    activeProjectRoot,
    pathStyle,
    homeDirectory,
    maxListResults: vars.FS_GATEWAY_MAX_LIST_RESULTS,
    maxSearchResults: vars.FS_GATEWAY_MAX_SEARCH_RESULTS,
    maxMatchesPerFile: vars.FS_GATEWAY_MAX_MATCHES_PER_FILE,
    maxLineLength: vars.FS_GATEWAY_MAX_LINE_LENGTH,
    scriptCommands: splitList(vars.FS_GATEWAY_SCRIPT_COMMANDS, ','),
    scriptTimeoutMs: vars.FS_GATEWAY_SCRIPT_TIMEOUT_MS,
  });
}

/** Freeze a configuration, including its lists */
export function freezeConfig(config: GatewayConfig): GatewayConfig {
  return Object.freeze({
    ...config,
    allowedDirectories: Object.freeze([...config.allowedDirectories]),
    scriptCommands: Object.freeze([...config.scriptCommands]),
  });
}
