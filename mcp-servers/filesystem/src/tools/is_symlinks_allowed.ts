/**
 * isSymlinksAllowed — Report the symbolic link policy.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { FilesystemContext } from '../context';

const paramsSchema = z.object({});

type Params = z.infer<typeof paramsSchema>;

export function createIsSymlinksAllowedTool(ctx: FilesystemContext): MCPTool<Params, { allowSymlinks: boolean }> {
  return {
    name: 'isSymlinksAllowed',
    description: 'Check if symbolic links are allowed',
    paramsSchema,
    mutating: false,

    async execute(): Promise<MCPResult<{ allowSymlinks: boolean }>> {
      return { success: true, data: { allowSymlinks: ctx.config.symlinksAllowed } };
    },
  };
}
