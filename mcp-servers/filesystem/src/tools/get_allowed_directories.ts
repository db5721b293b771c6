/**
 * getAllowedDirectories — List the directories file operations may touch.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { FilesystemContext } from '../context';

const paramsSchema = z.object({});

type Params = z.infer<typeof paramsSchema>;

export function createGetAllowedDirectoriesTool(ctx: FilesystemContext): MCPTool<Params, string[]> {
  return {
    name: 'getAllowedDirectories',
    description: 'Get list of allowed directories accessible for file operations',
    paramsSchema,
    mutating: false,

    async execute(): Promise<MCPResult<string[]>> {
      return { success: true, data: [...ctx.config.allowedDirectories] };
    },
  };
}
