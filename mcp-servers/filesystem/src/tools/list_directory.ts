/**
 * listDirectory — List files and directories.
 *
 * Non-recursive mode lists the directory's own entries. Recursive mode
 * walks the whole subtree and reports regular files only. Reserved device
 * names are always dropped; `pattern` must match the whole entry name.
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { compileFullMatch } from '../../../_shared/ts/validation';
import { childPath, entryInfo, requireDirectory, resolveAllowedPath, walkFiles, withFsErrors } from '../context';
import type { FileEntry, FilesystemContext } from '../context';
import { isReservedName } from '../security';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Directory path'),
  pattern: z.string().optional().describe('Filename regex pattern (optional)'),
  recursive: z.boolean().optional().default(false).describe('List recursively'),
});

type Params = z.infer<typeof paramsSchema>;

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createListDirectoryTool(ctx: FilesystemContext): MCPTool<Params, FileEntry[]> {
  const limit = ctx.config.maxListResults;

  return {
    name: 'listDirectory',
    description: 'List files and directories with optional filtering',
    paramsSchema,
    mutating: false,

    async execute(params: Params): Promise<MCPResult<FileEntry[]>> {
      const dirPath = await resolveAllowedPath(ctx, params.path);
      await requireDirectory(dirPath);

      const filter = params.pattern === undefined ? null : compileFullMatch(params.pattern);
      const accepts = (name: string): boolean => !isReservedName(name) && (filter === null || filter.test(name));
      const results: FileEntry[] = [];

      if (params.recursive) {
        for await (const file of walkFiles(dirPath, ctx.log, isReservedName)) {
          if (results.length >= limit) break;
          if (accepts(file.name)) results.push(await entryInfo(file.path, file.name));
        }
      } else {
        const entries = await withFsErrors(dirPath, () => fs.readdir(dirPath, { withFileTypes: true }));
        for (const entry of entries.sort(byName)) {
          if (results.length >= limit) break;
          if (accepts(entry.name)) results.push(await entryInfo(childPath(dirPath, entry.name), entry.name));
        }
      }

      if (results.length >= limit) {
        ctx.log.debug(`listDirectory ${dirPath}: stopped at ${limit} entries`);
      }
      return { success: true, data: results };
    },
  };
}
