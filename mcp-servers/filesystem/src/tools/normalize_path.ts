/**
 * normalizePath — Show the canonical, drive-letter and WSL forms of a path.
 *
 * Pure string conversion; the filesystem is not consulted.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { FilesystemContext } from '../context';
import type { PathRepresentations } from '../paths';

const paramsSchema = z.object({
  path: z.string().describe('Path to normalize'),
});

type Params = z.infer<typeof paramsSchema>;

export function createNormalizePathTool(ctx: FilesystemContext): MCPTool<Params, PathRepresentations> {
  return {
    name: 'normalizePath',
    description: 'Convert between Windows and WSL path formats',
    paramsSchema,
    mutating: false,

    async execute(params: Params): Promise<MCPResult<PathRepresentations>> {
      return { success: true, data: ctx.normalizer.describe(params.path) };
    },
  };
}
