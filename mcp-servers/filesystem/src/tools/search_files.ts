/**
 * searchFiles — Search file contents with a regular expression.
 *
 * Walks every file under `directory` whose name fully matches `filePattern`
 * and reports the lines matching `contentPattern`. Unreadable or oversized
 * files are skipped with a warning.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { errorMessage } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { compileFullMatch, compilePattern } from '../../../_shared/ts/validation';
import { requireDirectory, resolveAllowedPath, walkFiles } from '../context';
import type { FilesystemContext } from '../context';
import { isReservedName } from '../security';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface LineMatch {
  /** 1-based */
  lineNumber: number;
  line: string;
}

export interface SearchHit {
  path: string;
  name: string;
  matchCount: number;
  /** More lines matched than are listed in `matches` */
  truncatedMatches: boolean;
  matches: LineMatch[];
}

export const DEFAULT_FILE_PATTERN = '.*\\.(ts|tsx|js|jsx)$';

export const TRUNCATION_SUFFIX = '... (truncated)';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  directory: z.string().describe('Directory to search in'),
  contentPattern: z.string().min(1).describe('Regex pattern to search for in file contents'),
  filePattern: z
    .string()
    .optional()
    .default(DEFAULT_FILE_PATTERN)
    .describe('Regex pattern for filenames (default: TypeScript/JavaScript sources)'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Implementation ─────────────────────────────────────────────────────────

export function truncateLine(line: string, maxLength: number): string {
  return line.length > maxLength ? `${line.slice(0, maxLength)}${TRUNCATION_SUFFIX}` : line;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createSearchFilesTool(ctx: FilesystemContext): MCPTool<Params, SearchHit[]> {
  const { maxSearchResults, maxMatchesPerFile, maxLineLength, maxFileSizeMb } = ctx.config;
  const maxBytes = maxFileSizeMb * 1024 * 1024;

  async function scanFile(filePath: string, name: string, pattern: RegExp): Promise<SearchHit | null> {
    let content: string;
    try {
      const stat = await fs.stat(filePath);
      if (stat.size > maxBytes) {
        ctx.log.warn(`searchFiles: skipping ${filePath}, ${stat.size} bytes exceeds the size limit`);
        return null;
      }
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      ctx.log.warn(`searchFiles: skipping unreadable file ${filePath}: ${errorMessage(err)}`);
      return null;
    }

    const matches: LineMatch[] = [];
    let matchCount = 0;
    content.split(/\r?\n/).forEach((line, index) => {
      if (!pattern.test(line)) return;
      matchCount++;
      if (matches.length < maxMatchesPerFile) {
        matches.push({ lineNumber: index + 1, line: truncateLine(line, maxLineLength) });
      }
    });

    if (matchCount === 0) return null;
    return { path: filePath, name, matchCount, truncatedMatches: matchCount > matches.length, matches };
  }

  return {
    name: 'searchFiles',
    description: 'Search file contents using regex patterns',
    paramsSchema,
    mutating: false,

    async execute(params: Params): Promise<MCPResult<SearchHit[]>> {
      const dirPath = await resolveAllowedPath(ctx, params.directory);
      await requireDirectory(dirPath);

      const fileFilter = compileFullMatch(params.filePattern);
      const pattern = compilePattern(params.contentPattern);
      const hits: SearchHit[] = [];

      for await (const file of walkFiles(dirPath, ctx.log, isReservedName)) {
        if (hits.length >= maxSearchResults) break;
        if (!fileFilter.test(file.name)) continue;

        const hit = await scanFile(file.path, file.name, pattern);
        if (hit !== null) hits.push(hit);
      }

      return { success: true, data: hits };
    },
  };
}
