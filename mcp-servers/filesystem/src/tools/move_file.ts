/**
 * moveFile — Move or rename a file or directory.
 *
 * Mutating: refused unless writes are enabled. A rename, never copy+delete,
 * so the destination's parent must already exist.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { InvalidArgumentError, NotFoundError } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { assertWriteEnabled, exists, resolveAllowedPath, withFsErrors } from '../context';
import type { FilesystemContext } from '../context';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface MoveFileResult {
  source: string;
  destination: string;
}

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  source: z.string().describe('Source file path'),
  destination: z.string().describe('Destination file path'),
  overwrite: z.boolean().optional().default(false).describe('Overwrite if exists (default: false)'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createMoveFileTool(ctx: FilesystemContext): MCPTool<Params, MoveFileResult> {
  return {
    name: 'moveFile',
    description: 'Move or rename a file',
    paramsSchema,
    mutating: true,

    async execute(params: Params): Promise<MCPResult<MoveFileResult>> {
      assertWriteEnabled(ctx, 'moveFile');
      const source = await resolveAllowedPath(ctx, params.source);
      const destination = await resolveAllowedPath(ctx, params.destination);

      if (!(await exists(source))) {
        throw new NotFoundError(`Source not found: ${source}`);
      }
      if (source === destination) {
        return { success: true, data: { source, destination } };
      }
      if (!params.overwrite && (await exists(destination))) {
        throw new InvalidArgumentError(`Destination already exists: ${destination}`);
      }

      await withFsErrors(destination, () => fs.rename(source, destination));
      return { success: true, data: { source, destination } };
    },
  };
}
