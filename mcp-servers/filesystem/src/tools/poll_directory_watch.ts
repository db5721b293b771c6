/**
 * pollDirectoryWatch — Fetch buffered events for a watched directory.
 *
 * Never blocks. Events are not buffered by this server, so the list is
 * always empty; `watching` tells whether the directory is registered.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { resolveAllowedPath } from '../context';
import type { FilesystemContext } from '../context';
import type { WatchPoll } from '../watch-registry';

const paramsSchema = z.object({
  path: z.string().describe('Directory path being watched'),
});

type Params = z.infer<typeof paramsSchema>;

export function createPollDirectoryWatchTool(ctx: FilesystemContext): MCPTool<Params, WatchPoll> {
  return {
    name: 'pollDirectoryWatch',
    description: 'Poll for directory watch events',
    paramsSchema,
    mutating: false,

    async execute(params: Params): Promise<MCPResult<WatchPoll>> {
      const dirPath = await resolveAllowedPath(ctx, params.path);
      return { success: true, data: ctx.watches.poll(dirPath) };
    },
  };
}
