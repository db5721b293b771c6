/**
 * executeScript — Run a command script in an allowed directory.
 *
 * Mutating: refused unless writes are enabled, since scripts can change the
 * filesystem. The script itself is handed to the configured ScriptExecutor;
 * a failed script is reported with `success: false`, not thrown.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { assertWriteEnabled, requireDirectory, resolveAllowedPath } from '../context';
import type { FilesystemContext } from '../context';
import type { ScriptExecutionResult } from '../script-executor';

const paramsSchema = z.object({
  script: z.string().min(1).describe('Script to execute, one command per line'),
  workingDirectory: z.string().describe('Working directory for script execution'),
});

type Params = z.infer<typeof paramsSchema>;

export function createExecuteScriptTool(ctx: FilesystemContext): MCPTool<Params, ScriptExecutionResult> {
  return {
    name: 'executeScript',
    description: 'Execute a line-oriented command script restricted to allow-listed executables',
    paramsSchema,
    mutating: true,

    async execute(params: Params): Promise<MCPResult<ScriptExecutionResult>> {
      assertWriteEnabled(ctx, 'executeScript');
      const workingDir = await resolveAllowedPath(ctx, params.workingDirectory);
      await requireDirectory(workingDir);

      const result = await ctx.scripts.execute(params.script, workingDir);
      if (result.success) {
        ctx.log.info(`Script completed in ${workingDir}`, { durationMs: result.durationMs, lines: result.output.length });
      } else {
        ctx.log.warn(`Script failed in ${workingDir}: ${result.error ?? 'unknown error'}`);
      }
      return { success: result.success, data: result };
    },
  };
}
