/**
 * The filesystem tool catalog, in the order tools/list reports it.
 */

import type { MCPTool } from '../../../_shared/ts/mcp-base';
import type { FilesystemContext } from '../context';
import { createCopyFileTool } from './copy_file';
import { createCreateDirectoryTool } from './create_directory';
import { createDeleteFileTool } from './delete_file';
import { createExecuteScriptTool } from './execute_script';
import { createGetAllowedDirectoriesTool } from './get_allowed_directories';
import { createIsSymlinksAllowedTool } from './is_symlinks_allowed';
import { createListDirectoryTool } from './list_directory';
import { createMoveFileTool } from './move_file';
import { createNormalizePathTool } from './normalize_path';
import { createPollDirectoryWatchTool } from './poll_directory_watch';
import { createReadFileTool } from './read_file';
import { createSearchFilesTool } from './search_files';
import { createWatchDirectoryTool } from './watch_directory';
import { createWriteFileTool } from './write_file';

export function createFilesystemTools(ctx: FilesystemContext): MCPTool[] {
  return [
    createReadFileTool(ctx),
    createWriteFileTool(ctx),
    createListDirectoryTool(ctx),
    createSearchFilesTool(ctx),
    createNormalizePathTool(ctx),
    createCopyFileTool(ctx),
    createMoveFileTool(ctx),
    createDeleteFileTool(ctx),
    createCreateDirectoryTool(ctx),
    createExecuteScriptTool(ctx),
    createGetAllowedDirectoriesTool(ctx),
    createIsSymlinksAllowedTool(ctx),
    createWatchDirectoryTool(ctx),
    createPollDirectoryWatchTool(ctx),
  ];
}
