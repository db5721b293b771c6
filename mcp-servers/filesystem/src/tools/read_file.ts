/**
 * readFile — Read a text file.
 *
 * Enforces the configured size limit before reading. The decoded text is
 * returned as-is and becomes the response's text block.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { InvalidArgumentError } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { requireFile, resolveAllowedPath, resolveEncoding, withFsErrors } from '../context';
import type { FilesystemContext } from '../context';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('File path (Windows or WSL format)'),
  encoding: z.string().optional().default('utf-8').describe('Character encoding (default: utf-8)'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createReadFileTool(ctx: FilesystemContext): MCPTool<Params, string> {
  const maxBytes = ctx.config.maxFileSizeMb * 1024 * 1024;

  return {
    name: 'readFile',
    description: 'Read complete file contents with encoding support',
    paramsSchema,
    mutating: false,

    async execute(params: Params): Promise<MCPResult<string>> {
      const filePath = await resolveAllowedPath(ctx, params.path);
      const stat = await requireFile(filePath);

      if (stat.size > maxBytes) {
        throw new InvalidArgumentError(
          `File too large: ${filePath} is ${stat.size} bytes, limit is ${ctx.config.maxFileSizeMb} MB`,
        );
      }

      const encoding = resolveEncoding(params.encoding);
      const content = await withFsErrors(filePath, () => fs.readFile(filePath, { encoding }));
      return { success: true, data: content };
    },
  };
}
