import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import { InvalidArgumentError, NotFoundError, SecurityError } from '../../_shared/ts/errors';
import { createCopyFileTool } from '../src/tools/copy_file';
import { run, setupTestDir, teardownTestDir, testContext } from './helpers';

describe('copyFile', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: ['source.txt', 'existing.txt', 'private/secret.txt'], subdirs: ['public'] });
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should copy a file and report its size', async () => {
    const copyFile = createCopyFileTool(testContext([testDir], { writeEnabled: true }));
    const src = `${testDir}/source.txt`;
    const dest = `${testDir}/copies/copy.txt`;

    const result = await run(copyFile, { source: src, destination: dest });
    expect(result.data).toEqual({ source: src, destination: dest, size: 'content of source.txt'.length });
    expect(await fs.readFile(dest, 'utf-8')).toBe('content of source.txt');
    expect(await fs.readFile(src, 'utf-8')).toBe('content of source.txt');
  });

  it('should only replace an existing destination with overwrite', async () => {
    const copyFile = createCopyFileTool(testContext([testDir], { writeEnabled: true }));
    const args = { source: `${testDir}/source.txt`, destination: `${testDir}/existing.txt` };

    await expect(run(copyFile, args)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(await fs.readFile(`${testDir}/existing.txt`, 'utf-8')).toBe('content of existing.txt');

    await run(copyFile, { ...args, overwrite: true });
    expect(await fs.readFile(`${testDir}/existing.txt`, 'utf-8')).toBe('content of source.txt');
  });

  it('should throw for a missing source', async () => {
    const copyFile = createCopyFileTool(testContext([testDir], { writeEnabled: true }));
    await expect(
      run(copyFile, { source: `${testDir}/missing.txt`, destination: `${testDir}/x.txt` }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should check the source against the allowed directories', async () => {
    const copyFile = createCopyFileTool(testContext([`${testDir}/public`], { writeEnabled: true }));
    await expect(
      run(copyFile, { source: `${testDir}/private/secret.txt`, destination: `${testDir}/public/leak.txt` }),
    ).rejects.toBeInstanceOf(SecurityError);
    await expect(fs.access(`${testDir}/public/leak.txt`)).rejects.toThrow();
  });

  it('should refuse when writes are disabled', async () => {
    const copyFile = createCopyFileTool(testContext([testDir]));
    await expect(
      run(copyFile, { source: `${testDir}/source.txt`, destination: `${testDir}/blocked-copy.txt` }),
    ).rejects.toBeInstanceOf(SecurityError);
    await expect(fs.access(`${testDir}/blocked-copy.txt`)).rejects.toThrow();
  });

  it('has correct metadata', () => {
    const copyFile = createCopyFileTool(testContext([testDir]));
    expect(copyFile.name).toBe('copyFile');
    expect(copyFile.mutating).toBe(true);
  });
});
