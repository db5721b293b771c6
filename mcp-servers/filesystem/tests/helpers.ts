/**
 * Test helpers for the filesystem MCP server.
 *
 * Provides temporary directory setup/teardown, configuration and context
 * builders, and a MockScriptExecutor for the executeScript tool.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { DEFAULTS, freezeConfig } from '../src/config';
import type { GatewayConfig } from '../src/config';
import { createContext } from '../src/context';
import type { FilesystemContext } from '../src/context';
import type { ScriptExecutionResult, ScriptExecutor } from '../src/script-executor';
import type { MCPResult, MCPTool } from '../../_shared/ts/mcp-base';

/** Create a temporary test directory with optional files. */
export async function setupTestDir(opts?: {
  files?: string[];
  subdirs?: string[];
}): Promise<string> {
  // realpath so results compare equal on hosts where tmpdir is a symlink
  const testDir = (await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'fs-gateway-test-')))).replace(/\\/g, '/');

  if (opts?.subdirs) {
    for (const subdir of opts.subdirs) {
      await fs.mkdir(path.join(testDir, subdir), { recursive: true });
    }
  }

  if (opts?.files) {
    for (const file of opts.files) {
      const filePath = path.join(testDir, file);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, `content of ${file}`, 'utf-8');
    }
  }

  return testDir;
}

/** Remove a temporary test directory. */
export async function teardownTestDir(testDir: string): Promise<void> {
  await fs.rm(testDir, { recursive: true, force: true });
}

/** A frozen configuration allowing `allowed`, with writes disabled unless overridden */
export function testConfig(allowed: string[], overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return freezeConfig({
    allowedDirectories: allowed,
    maxFileSizeMb: DEFAULTS.maxFileSizeMb,
    writeEnabled: false,
    symlinksAllowed: false,
    activeProjectRoot: null,
    pathStyle: 'posix',
    homeDirectory: '/home/tester',
    maxListResults: DEFAULTS.maxListResults,
    maxSearchResults: DEFAULTS.maxSearchResults,
    maxMatchesPerFile: DEFAULTS.maxMatchesPerFile,
    maxLineLength: DEFAULTS.maxLineLength,
    scriptCommands: [],
    scriptTimeoutMs: DEFAULTS.scriptTimeoutMs,
    ...overrides,
  });
}

/** Context over `allowed` with a MockScriptExecutor */
export function testContext(
  allowed: string[],
  overrides: Partial<GatewayConfig> = {},
  scripts: ScriptExecutor = new MockScriptExecutor(),
): FilesystemContext {
  return createContext(testConfig(allowed, overrides), { scripts });
}

/** Validate raw arguments with the tool's schema, then execute it */
export async function run<TParams, TData>(
  tool: MCPTool<TParams, TData>,
  args: Record<string, unknown>,
): Promise<MCPResult<TData>> {
  return tool.execute(tool.paramsSchema.parse(args));
}

/**
 * Records every call and answers with a fixed outcome.
 */
export class MockScriptExecutor implements ScriptExecutor {
  readonly calls: Array<{ script: string; workingDir: string }> = [];

  constructor(private readonly outcome: { success: boolean; output: string[]; error?: string } = { success: true, output: ['ok'] }) {}

  async execute(script: string, workingDir: string): Promise<ScriptExecutionResult> {
    this.calls.push({ script, workingDir });
    return { ...this.outcome, output: [...this.outcome.output], workingDir, durationMs: 0 };
  }
}
