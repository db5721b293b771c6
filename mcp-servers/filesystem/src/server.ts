/**
 * Filesystem gateway server assembly.
 */

import { MCPServer } from '../../_shared/ts/mcp-base';
import type { GatewayConfig } from './config';
import { createContext } from './context';
import type { ContextOverrides } from './context';
import { createFilesystemTools } from './tools';

export const SERVER_NAME = 'mcp-fs-gateway';
export const SERVER_VERSION = '1.0.0';

/** Build a server with the full filesystem tool catalog */
export function createFilesystemServer(config: GatewayConfig, overrides: ContextOverrides = {}): MCPServer {
  const ctx = createContext(config, overrides);
  return new MCPServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: createFilesystemTools(ctx),
  });
}
