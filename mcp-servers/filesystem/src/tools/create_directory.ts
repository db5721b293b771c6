/**
 * createDirectory — Create a directory, including missing parents.
 *
 * Mutating: refused unless writes are enabled. An existing directory is not
 * an error (`created: false`); an existing file at the path is.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { InvalidArgumentError } from '../../../_shared/ts/errors';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { assertWriteEnabled, resolveAllowedPath, statOrNull, withFsErrors } from '../context';
import type { FilesystemContext } from '../context';

export interface CreateDirectoryResult {
  path: string;
  created: boolean;
  exists: boolean;
}

const paramsSchema = z.object({
  path: z.string().describe('Directory path to create'),
});

type Params = z.infer<typeof paramsSchema>;

export function createCreateDirectoryTool(ctx: FilesystemContext): MCPTool<Params, CreateDirectoryResult> {
  return {
    name: 'createDirectory',
    description: 'Create a directory (including parent directories)',
    paramsSchema,
    mutating: true,

    async execute(params: Params): Promise<MCPResult<CreateDirectoryResult>> {
      assertWriteEnabled(ctx, 'createDirectory');
      const dirPath = await resolveAllowedPath(ctx, params.path);

      const existing = await statOrNull(dirPath);
      if (existing !== null) {
        if (!existing.isDirectory()) {
          throw new InvalidArgumentError(`Exists and is not a directory: ${dirPath}`);
        }
        return { success: true, data: { path: dirPath, created: false, exists: true } };
      }

      // mkdir returns the first directory it had to create
      const first = await withFsErrors(dirPath, () => fs.mkdir(dirPath, { recursive: true }));
      const after = await statOrNull(dirPath);
      const exists = after !== null && after.isDirectory();
      return { success: exists, data: { path: dirPath, created: first !== undefined, exists } };
    },
  };
}
