/**
 * Path security policy.
 *
 * Decides whether a normalized path may reach a filesystem primitive:
 * reserved device names are refused outright, symbolic links are refused
 * unless enabled, and the canonical (symlink-free) path must sit inside an
 * allowed directory, compared segment by segment.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { componentLogger } from '../../_shared/ts/logger';
import type { GatewayConfig } from './config';
import type { PathStyle } from './paths';

// ─── Types ──────────────────────────────────────────────────────────────────

export type SecurityDecision =
  | { allowed: true; canonicalPath: string }
  | { allowed: false; canonicalPath: string; reason: string };

export interface PathSecurityOptions {
  allowedDirectories: readonly string[];
  symlinksAllowed: boolean;
  style: PathStyle;
}

// ─── Reserved Names ─────────────────────────────────────────────────────────

const RESERVED_NAME = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])(\..*)?$/i;

/** True for platform device names such as `NUL`, `com1.txt` or `LPT9` */
export function isReservedName(name: string): boolean {
  return RESERVED_NAME.test(name);
}

// ─── Canonicalization ───────────────────────────────────────────────────────

function toForwardSlashes(p: string): string {
  return p.replace(/\\/g, '/');
}

/** Links followed before a path is treated as a loop */
const MAX_LINK_DEPTH = 32;

/**
 * Resolve symlinks in the longest existing prefix of `p` and re-append the
 * part that does not exist yet. A dangling link is followed to its target,
 * so the result names where a write through it would land. Returns `p`
 * unchanged when no prefix resolves, and null for a symlink loop.
 */
export async function canonicalize(p: string): Promise<string | null> {
  const missing: string[] = [];
  let current = p;
  let links = 0;

  for (;;) {
    const real = await fs.realpath(current).catch(() => null);
    if (real !== null) {
      return toForwardSlashes(missing.length > 0 ? path.join(real, ...missing.reverse()) : real);
    }

    // A dangling link: continue from its target
    const target = await fs.readlink(current).catch(() => null);
    if (target !== null) {
      links++;
      if (links > MAX_LINK_DEPTH) return null;
      current = path.resolve(path.dirname(current), target);
      continue;
    }

    // Not there (yet); try the parent
    const parent = path.dirname(current);
    if (parent === current || parent === '.') return p;
    missing.push(path.basename(current));
    current = parent;
  }
}

async function isSymlink(p: string): Promise<boolean> {
  try {
    const stat = await fs.lstat(p);
    return stat.isSymbolicLink();
  } catch {
    return false;
  }
}

// ─── PathSecurityPolicy ─────────────────────────────────────────────────────

export class PathSecurityPolicy {
  private readonly options: PathSecurityOptions;
  private readonly log = componentLogger('security');
  private canonicalRoots: Promise<string[]> | null = null;

  constructor(options: PathSecurityOptions) {
    this.options = options;
  }

  static fromConfig(config: GatewayConfig): PathSecurityPolicy {
    return new PathSecurityPolicy({
      allowedDirectories: config.allowedDirectories,
      symlinksAllowed: config.symlinksAllowed,
      style: config.pathStyle,
    });
  }

  /** ALLOW/DENY for a path produced by PathNormalizer */
  async isAllowed(normalizedPath: string): Promise<boolean> {
    const decision = await this.check(normalizedPath);
    return decision.allowed;
  }

  /** Same as isAllowed(), with the canonical path and the reason for a denial */
  async check(normalizedPath: string): Promise<SecurityDecision> {
    const name = path.posix.basename(normalizedPath);
    if (isReservedName(name)) {
      return this.deny(normalizedPath, normalizedPath, `Reserved device name: ${name}`);
    }

    const canonicalPath = await canonicalize(normalizedPath);
    if (canonicalPath === null) {
      return this.deny(normalizedPath, normalizedPath, 'Too many levels of symbolic links');
    }

    if (!this.options.symlinksAllowed && (await isSymlink(normalizedPath))) {
      return this.deny(normalizedPath, canonicalPath, 'Symbolic links are not allowed');
    }

    const roots = await this.roots();
    const candidate = this.comparable(canonicalPath);
    const inside = roots.some((root) => candidate === root || candidate.startsWith(root.endsWith('/') ? root : `${root}/`));
    if (!inside) {
      return this.deny(normalizedPath, canonicalPath, 'Path is outside the allowed directories');
    }

    return { allowed: true, canonicalPath };
  }

  private deny(requested: string, canonicalPath: string, reason: string): SecurityDecision {
    this.log.warn(`Denied ${requested}: ${reason}`);
    return { allowed: false, canonicalPath, reason };
  }

  /** Allowed directories, canonicalized once on first use */
  private roots(): Promise<string[]> {
    if (this.canonicalRoots === null) {
      this.canonicalRoots = Promise.all(
        this.options.allowedDirectories.map(async (dir) => this.comparable((await canonicalize(dir)) ?? dir)),
      );
    }
    return this.canonicalRoots;
  }

  private comparable(p: string): string {
    return this.options.style === 'windows' ? p.toLowerCase() : p;
  }
}
