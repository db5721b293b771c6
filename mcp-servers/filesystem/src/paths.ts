/**
 * Path normalization.
 *
 * Turns whatever the client sends (backslashes, `~`, drive letters, WSL
 * mount paths, relative paths) into one canonical absolute form with
 * forward slashes. Pure string work: nothing here touches the filesystem,
 * so it is safe to call before any existence or security check.
 */

import * as path from 'path';
import { FormatError } from '../../_shared/ts/errors';

// ─── Types ──────────────────────────────────────────────────────────────────

/** `posix` canonicalizes `C:/x` to `/mnt/c/x`; `windows` does the reverse */
export type PathStyle = 'posix' | 'windows';

export interface PathNormalizerOptions {
  style: PathStyle;
  homeDirectory: string;
  /** Absolute directory relative paths are resolved against */
  baseDirectory: string;
}

/** Result of the normalizePath tool */
export interface PathRepresentations {
  original: string;
  normalized: string;
  windows: string;
  wsl: string;
}

// ─── Patterns ───────────────────────────────────────────────────────────────

/** `C:`, `c:/`, `C:/Users/...` */
const DRIVE_PATH = /^([A-Za-z]):(?:\/(.*))?$/;

/** `/mnt/c`, `/mnt/c/Users/...` */
const MOUNT_PATH = /^\/mnt\/([A-Za-z])(?:\/(.*))?$/;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Collapse `.`/`..` and duplicate separators; drop a trailing separator except on `/` */
function collapse(absolute: string): string {
  const normalized = path.posix.normalize(absolute);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function driveForm(letter: string, rest: string | undefined): string {
  return `${letter.toUpperCase()}:${collapse(`/${rest ?? ''}`)}`;
}

function mountForm(letter: string, rest: string | undefined): string {
  return collapse(`/mnt/${letter.toLowerCase()}/${rest ?? ''}`);
}

/** Drive form to WSL mount form; anything else unchanged */
export function toWslPath(normalized: string): string {
  const drive = DRIVE_PATH.exec(normalized);
  return drive ? mountForm(drive[1], drive[2]) : normalized;
}

/** WSL mount form to drive form; anything else unchanged */
export function toWindowsPath(normalized: string): string {
  const mount = MOUNT_PATH.exec(normalized);
  return mount ? driveForm(mount[1], mount[2]) : normalized;
}

// ─── PathNormalizer ─────────────────────────────────────────────────────────

export class PathNormalizer {
  readonly style: PathStyle;
  private readonly homeDirectory: string;
  private readonly baseDirectory: string;

  constructor(options: PathNormalizerOptions) {
    this.style = options.style;
    this.homeDirectory = options.homeDirectory.replace(/\\/g, '/');
    this.baseDirectory = this.toAbsolute(options.baseDirectory.replace(/\\/g, '/'), '/');
  }

  /**
   * Canonical absolute form of `raw`.
   *
   * Deterministic and idempotent. Throws FormatError for non-strings, empty
   * or whitespace-only strings and strings containing NUL.
   *
   * @example
   * // style 'posix', base '/data'
   * normalize('C:\\Users\\me')   // '/mnt/c/Users/me'
   * normalize('notes/../a.txt') // '/data/a.txt'
   */
  normalize(raw: unknown): string {
    if (typeof raw !== 'string') {
      throw new FormatError('Path must be a string');
    }
    if (raw.includes('\0')) {
      throw new FormatError('Path contains a NUL character');
    }
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      throw new FormatError('Path must not be empty');
    }

    const forward = trimmed.replace(/\\/g, '/');
    return this.toAbsolute(this.expandHome(forward), this.baseDirectory);
  }

  /** Original, normalized, drive-letter and WSL forms of a path */
  describe(raw: string): PathRepresentations {
    const normalized = this.normalize(raw);
    return {
      original: raw,
      normalized,
      windows: toWindowsPath(normalized),
      wsl: toWslPath(normalized),
    };
  }

  private expandHome(p: string): string {
    if (p === '~') return this.homeDirectory;
    if (p.startsWith('~/')) return `${this.homeDirectory}/${p.slice(2)}`;
    return p;
  }

  private toAbsolute(p: string, base: string): string {
    const drive = DRIVE_PATH.exec(p);
    const mount = MOUNT_PATH.exec(p);

    if (this.style === 'windows') {
      if (drive) return driveForm(drive[1], drive[2]);
      if (mount) return driveForm(mount[1], mount[2]);
      if (p.startsWith('/')) return collapse(p);
      return this.resolveAgainst(base, p);
    }

    if (drive) return mountForm(drive[1], drive[2]);
    if (p.startsWith('/')) return collapse(p);
    return this.resolveAgainst(base, p);
  }

  private resolveAgainst(base: string, relative: string): string {
    const drive = DRIVE_PATH.exec(base);
    if (drive) {
      return driveForm(drive[1], `${drive[2] ?? ''}/${relative}`);
    }
    return collapse(`${base}/${relative}`);
  }
}
