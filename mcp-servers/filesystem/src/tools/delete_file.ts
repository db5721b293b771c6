/**
 * deleteFile — Delete a file or directory.
 *
 * Mutating: refused unless writes are enabled. A non-empty directory is only
 * removed with `recursive: true`, which deletes children before parents and
 * logs and skips entries it cannot remove. `deleted` reports whether the
 * path is gone afterwards.
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import { z } from 'zod';
import { errorMessage, InvalidArgumentError } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { assertWriteEnabled, childPath, exists, resolveAllowedPath, withFsErrors } from '../context';
import type { FilesystemContext } from '../context';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface DeleteFileResult {
  path: string;
  deleted: boolean;
}

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('File or directory path'),
  recursive: z.boolean().optional().default(false).describe('Delete directory recursively'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createDeleteFileTool(ctx: FilesystemContext): MCPTool<Params, DeleteFileResult> {
  /** Depth-first removal; returns the number of entries that could not be removed */
  async function removeTree(dirPath: string): Promise<number> {
    let failures = 0;
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      ctx.log.warn(`deleteFile: cannot read ${dirPath}: ${errorMessage(err)}`);
      return 1;
    }

    for (const entry of entries) {
      const full = childPath(dirPath, entry.name);
      if (entry.isDirectory()) {
        failures += await removeTree(full);
        continue;
      }
      try {
        await fs.unlink(full);
      } catch (err) {
        failures++;
        ctx.log.warn(`deleteFile: failed to delete ${full}: ${errorMessage(err)}`);
      }
    }

    try {
      await fs.rmdir(dirPath);
    } catch (err) {
      failures++;
      ctx.log.warn(`deleteFile: failed to delete ${dirPath}: ${errorMessage(err)}`);
    }
    return failures;
  }

  return {
    name: 'deleteFile',
    description: 'Delete a file or directory',
    paramsSchema,
    mutating: true,

    async execute(params: Params): Promise<MCPResult<DeleteFileResult>> {
      assertWriteEnabled(ctx, 'deleteFile');
      const target = await resolveAllowedPath(ctx, params.path);

      if (ctx.config.allowedDirectories.includes(target)) {
        throw new InvalidArgumentError(`Refusing to delete an allowed directory: ${target}`);
      }

      const stat = await withFsErrors(target, () => fs.lstat(target));

      if (!stat.isDirectory()) {
        await withFsErrors(target, () => fs.unlink(target));
      } else if (!params.recursive) {
        await withFsErrors(target, () => fs.rmdir(target));
      } else {
        const failures = await removeTree(target);
        if (failures > 0) {
          ctx.log.warn(`deleteFile: ${failures} entries under ${target} could not be removed`);
        }
      }

      const deleted = !(await exists(target));
      return { success: deleted, data: { path: target, deleted } };
    },
  };
}
