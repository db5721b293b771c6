/**
 * writeFile — Write content to a file.
 *
 * Mutating: refused unless writes are enabled. Missing parent directories
 * are created. With `createBackup`, an existing target is first copied to
 * `<path>.backup`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { InvalidArgumentError } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { assertWriteEnabled, resolveAllowedPath, resolveEncoding, statOrNull, withFsErrors } from '../context';
import type { FilesystemContext } from '../context';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface WriteFileResult {
  path: string;
  size: number;
  backup: string | null;
}

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('File path (Windows or WSL format)'),
  content: z.string().describe('Content to write'),
  encoding: z.string().optional().default('utf-8').describe('Character encoding (default: utf-8)'),
  createBackup: z.boolean().optional().default(false).describe('Create .backup file before overwriting'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createWriteFileTool(ctx: FilesystemContext): MCPTool<Params, WriteFileResult> {
  return {
    name: 'writeFile',
    description: 'Write content to a file with optional backup',
    paramsSchema,
    mutating: true,

    async execute(params: Params): Promise<MCPResult<WriteFileResult>> {
      assertWriteEnabled(ctx, 'writeFile');
      const filePath = await resolveAllowedPath(ctx, params.path);
      const encoding = resolveEncoding(params.encoding);

      const existing = await statOrNull(filePath);
      if (existing?.isDirectory()) {
        throw new InvalidArgumentError(`Is a directory: ${filePath}`);
      }

      let backup: string | null = null;
      if (params.createBackup && existing !== null) {
        const backupPath = await resolveAllowedPath(ctx, `${filePath}.backup`);
        await withFsErrors(backupPath, () => fs.copyFile(filePath, backupPath));
        ctx.log.info(`Backup created: ${backupPath}`);
        backup = backupPath;
      }

      await withFsErrors(filePath, async () => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, params.content, { encoding });
      });

      return {
        success: true,
        data: { path: filePath, size: Buffer.byteLength(params.content, encoding), backup },
      };
    },
  };
}
