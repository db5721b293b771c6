/**
 * copyFile — Copy a file to a new location.
 *
 * Mutating: refused unless writes are enabled. Both paths must pass the
 * security policy. An existing destination is replaced only with
 * `overwrite: true`.
 */

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidArgumentError } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { assertWriteEnabled, requireFile, resolveAllowedPath, statOrNull, withFsErrors } from '../context';
import type { FilesystemContext } from '../context';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface CopyFileResult {
  source: string;
  destination: string;
  size: number;
}

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  source: z.string().describe('Source file path'),
  destination: z.string().describe('Destination file path'),
  overwrite: z.boolean().optional().default(false).describe('Overwrite if exists (default: false)'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createCopyFileTool(ctx: FilesystemContext): MCPTool<Params, CopyFileResult> {
  return {
    name: 'copyFile',
    description: 'Copy a file to a new location',
    paramsSchema,
    mutating: true,

    async execute(params: Params): Promise<MCPResult<CopyFileResult>> {
      assertWriteEnabled(ctx, 'copyFile');
      const source = await resolveAllowedPath(ctx, params.source);
      const destination = await resolveAllowedPath(ctx, params.destination);

      const stat = await requireFile(source);
      const target = await statOrNull(destination);
      if (target?.isDirectory()) {
        throw new InvalidArgumentError(`Destination is a directory: ${destination}`);
      }
      if (target !== null && !params.overwrite) {
        throw new InvalidArgumentError(`Destination already exists: ${destination}`);
      }

      await withFsErrors(destination, async () => {
        await fs.mkdir(path.dirname(destination), { recursive: true });
        await fs.copyFile(source, destination, params.overwrite ? 0 : fsConstants.COPYFILE_EXCL);
      });

      return { success: true, data: { source, destination, size: stat.size } };
    },
  };
}
