/**
 * watchDirectory — Register interest in a directory's changes.
 *
 * A one-shot registration; no watcher runs in the background. See
 * pollDirectoryWatch.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { requireDirectory, resolveAllowedPath } from '../context';
import type { FilesystemContext } from '../context';
import { WATCH_EVENT_TYPES } from '../watch-registry';
import type { WatchRegistration } from '../watch-registry';

const paramsSchema = z.object({
  path: z.string().describe('Directory path to watch'),
  eventTypes: z
    .array(z.enum(WATCH_EVENT_TYPES))
    .min(1)
    .optional()
    .default([...WATCH_EVENT_TYPES])
    .describe("Event types to watch for (default: ['CREATE', 'MODIFY', 'DELETE'])"),
});

type Params = z.infer<typeof paramsSchema>;

export function createWatchDirectoryTool(ctx: FilesystemContext): MCPTool<Params, WatchRegistration> {
  return {
    name: 'watchDirectory',
    description: 'Watch a directory for file changes (CREATE, MODIFY, DELETE events)',
    paramsSchema,
    mutating: false,

    async execute(params: Params): Promise<MCPResult<WatchRegistration>> {
      const dirPath = await resolveAllowedPath(ctx, params.path);
      await requireDirectory(dirPath);

      const registration = ctx.watches.register(dirPath, params.eventTypes);
      ctx.log.info(`Watching ${dirPath}`, { eventTypes: registration.eventTypes });
      return { success: true, data: registration };
    },
  };
}
