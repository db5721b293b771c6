import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { NotFoundError, SecurityError } from '../../_shared/ts/errors';
import { createExecuteScriptTool } from '../src/tools/execute_script';
import { MockScriptExecutor, run, setupTestDir, teardownTestDir, testContext } from './helpers';

describe('executeScript', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await setupTestDir({ subdirs: ['work'] });
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should hand the script and normalized directory to the executor', async () => {
    const scripts = new MockScriptExecutor();
    const executeScript = createExecuteScriptTool(testContext([testDir], { writeEnabled: true }, scripts));

    const result = await run(executeScript, { script: 'git status', workingDirectory: `${testDir}\\work\\` });

    expect(scripts.calls).toEqual([{ script: 'git status', workingDir: `${testDir}/work` }]);
    expect(result).toEqual({
      success: true,
      data: { success: true, output: ['ok'], workingDir: `${testDir}/work`, durationMs: 0 },
    });
  });

  it('should pass a failed script through as an unsuccessful result', async () => {
    const scripts = new MockScriptExecutor({ success: false, output: [], error: 'Line 1: command not allowed: rm' });
    const executeScript = createExecuteScriptTool(testContext([testDir], { writeEnabled: true }, scripts));

    const result = await run(executeScript, { script: 'rm -rf .', workingDirectory: testDir });
    expect(result.success).toBe(false);
    expect(result.data.error).toBe('Line 1: command not allowed: rm');
  });

  it('should refuse when writes are disabled', async () => {
    const scripts = new MockScriptExecutor();
    const executeScript = createExecuteScriptTool(testContext([testDir], {}, scripts));
    await expect(run(executeScript, { script: 'git status', workingDirectory: testDir })).rejects.toBeInstanceOf(
      SecurityError,
    );
    expect(scripts.calls).toEqual([]);
  });

  it('should require an existing working directory', async () => {
    const scripts = new MockScriptExecutor();
    const executeScript = createExecuteScriptTool(testContext([testDir], { writeEnabled: true }, scripts));
    await expect(
      run(executeScript, { script: 'git status', workingDirectory: `${testDir}/missing` }),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(scripts.calls).toEqual([]);
  });

  it('has correct metadata', () => {
    const executeScript = createExecuteScriptTool(testContext([testDir]));
    expect(executeScript.name).toBe('executeScript');
    expect(executeScript.mutating).toBe(true);
  });
});
