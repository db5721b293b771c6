/**
 * Shared state and guards for the filesystem tools.
 *
 * Every tool is created from a FilesystemContext and runs the same gate
 * sequence before touching the disk: write-enabled check for mutating tools,
 * then normalize, then the security policy, then existence/type checks.
 */

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import type { Dirent, Stats } from 'fs';
import {
  InternalError,
  InvalidArgumentError,
  MCPError,
  NotFoundError,
  SecurityError,
  errorMessage,
  isErrnoException,
} from '../../_shared/ts/errors';
import { componentLogger } from '../../_shared/ts/logger';
import type { Logger } from '../../_shared/ts/logger';
import type { GatewayConfig } from './config';
import { PathNormalizer } from './paths';
import { PathSecurityPolicy } from './security';
import { CommandScriptExecutor } from './script-executor';
import type { ScriptExecutor } from './script-executor';
import { WatchRegistry } from './watch-registry';

// ─── Context ────────────────────────────────────────────────────────────────

export interface FilesystemContext {
  readonly config: GatewayConfig;
  readonly normalizer: PathNormalizer;
  readonly security: PathSecurityPolicy;
  readonly scripts: ScriptExecutor;
  readonly watches: WatchRegistry;
  readonly log: Logger;
}

export interface ContextOverrides {
  scripts?: ScriptExecutor;
}

/** Wire the per-process collaborators around a configuration */
export function createContext(config: GatewayConfig, overrides: ContextOverrides = {}): FilesystemContext {
  return {
    config,
    normalizer: new PathNormalizer({
      style: config.pathStyle,
      homeDirectory: config.homeDirectory,
      baseDirectory: config.activeProjectRoot ?? config.allowedDirectories[0] ?? process.cwd(),
    }),
    security: PathSecurityPolicy.fromConfig(config),
    scripts: overrides.scripts ?? CommandScriptExecutor.fromConfig(config),
    watches: new WatchRegistry(),
    log: componentLogger('filesystem'),
  };
}

// ─── Guards ─────────────────────────────────────────────────────────────────

/** Throws SecurityError unless writes are enabled */
export function assertWriteEnabled(ctx: FilesystemContext, operation: string): void {
  if (!ctx.config.writeEnabled) {
    throw new SecurityError(`Write operations are disabled: ${operation} refused`);
  }
}

/**
 * Normalize a client-supplied path and check it against the security policy.
 * Returns the normalized path; throws FormatError or SecurityError.
 */
export async function resolveAllowedPath(ctx: FilesystemContext, raw: unknown): Promise<string> {
  const normalized = ctx.normalizer.normalize(raw);
  const decision = await ctx.security.check(normalized);
  if (!decision.allowed) {
    throw new SecurityError(`Access denied: ${normalized} (${decision.reason})`, { path: normalized });
  }
  return normalized;
}

// ─── Errno Translation ──────────────────────────────────────────────────────

/** Map a thrown filesystem error onto the error taxonomy */
export function translateFsError(err: unknown, target: string): MCPError {
  if (err instanceof MCPError) return err;
  if (!isErrnoException(err)) {
    return new InternalError(`${errorMessage(err)} (${target})`);
  }

  switch (err.code) {
    case 'ENOENT':
      return new NotFoundError(`No such file or directory: ${target}`);
    case 'EEXIST':
      return new InvalidArgumentError(`Already exists: ${target}`);
    case 'ENOTDIR':
      return new InvalidArgumentError(`Not a directory: ${target}`);
    case 'EISDIR':
      return new InvalidArgumentError(`Is a directory: ${target}`);
    case 'ENOTEMPTY':
      return new InvalidArgumentError(`Directory not empty: ${target}`);
    case 'EACCES':
    case 'EPERM':
      return new SecurityError(`Permission denied: ${target}`, { path: target });
    default:
      return new InternalError(`${err.code ?? 'Unknown error'}: ${target}`);
  }
}

/** Run a filesystem call, translating errno failures */
export async function withFsErrors<T>(target: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw translateFsError(err, target);
  }
}

// ─── Existence Checks ───────────────────────────────────────────────────────

/** stat() that returns null for a missing path */
export async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return null;
    throw translateFsError(err, p);
  }
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export async function requireFile(p: string): Promise<Stats> {
  const stat = await statOrNull(p);
  if (stat === null) throw new NotFoundError(`File not found: ${p}`);
  if (!stat.isFile()) throw new InvalidArgumentError(`Not a file: ${p}`);
  return stat;
}

export async function requireDirectory(p: string): Promise<Stats> {
  const stat = await statOrNull(p);
  if (stat === null) throw new NotFoundError(`Directory not found: ${p}`);
  if (!stat.isDirectory()) throw new InvalidArgumentError(`Not a directory: ${p}`);
  return stat;
}

/** Validated Node.js encoding name; `utf-8`, `latin1`, etc. */
export function resolveEncoding(name: string): BufferEncoding {
  const candidate = name.trim().toLowerCase();
  if (!Buffer.isEncoding(candidate)) {
    throw new InvalidArgumentError(`Unsupported encoding: ${name}`);
  }
  return candidate;
}

// ─── Entry Info ─────────────────────────────────────────────────────────────

export interface FileEntry {
  path: string;
  name: string;
  type: 'file' | 'directory' | 'symlink' | 'unknown';
  size: number;
  /** Epoch milliseconds */
  lastModified: number;
  readable: boolean;
  writable: boolean;
  executable: boolean;
  error?: string;
}

async function canAccess(p: string, mode: number): Promise<boolean> {
  try {
    await fs.access(p, mode);
    return true;
  } catch {
    return false;
  }
}

/**
 * Describe one directory entry.
 * Attribute failures produce an `unknown` entry carrying the error message.
 */
export async function entryInfo(fullPath: string, name: string): Promise<FileEntry> {
  try {
    const stat = await fs.lstat(fullPath);
    const type = stat.isSymbolicLink() ? 'symlink' : stat.isDirectory() ? 'directory' : stat.isFile() ? 'file' : 'unknown';
    return {
      path: fullPath,
      name,
      type,
      size: stat.size,
      lastModified: Math.floor(stat.mtimeMs),
      readable: await canAccess(fullPath, fsConstants.R_OK),
      writable: await canAccess(fullPath, fsConstants.W_OK),
      executable: await canAccess(fullPath, fsConstants.X_OK),
    };
  } catch (err) {
    return {
      path: fullPath,
      name,
      type: 'unknown',
      size: 0,
      lastModified: 0,
      readable: false,
      writable: false,
      executable: false,
      error: errorMessage(err),
    };
  }
}

// ─── Tree Walking ───────────────────────────────────────────────────────────

/** Join a child name onto a normalized, forward-slash path */
export function childPath(parent: string, name: string): string {
  return parent.endsWith('/') ? `${parent}${name}` : `${parent}/${name}`;
}

/**
 * Yield every regular file under `root`, depth first, names in sorted order.
 *
 * Symbolic links are not followed and reserved device names are skipped.
 * Unreadable directories are logged and skipped.
 */
export async function* walkFiles(
  root: string,
  log: Logger,
  isSkipped: (name: string) => boolean,
): AsyncGenerator<{ path: string; name: string }> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    log.warn(`Skipping unreadable directory ${root}: ${errorMessage(err)}`);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    if (isSkipped(entry.name)) continue;
    const full = childPath(root, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(full, log, isSkipped);
    } else if (entry.isFile()) {
      yield { path: full, name: entry.name };
    }
  }
}
