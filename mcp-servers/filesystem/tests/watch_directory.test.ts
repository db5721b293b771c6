import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { InvalidArgumentError, NotFoundError } from '../../_shared/ts/errors';
import { createPollDirectoryWatchTool } from '../src/tools/poll_directory_watch';
import { createWatchDirectoryTool } from '../src/tools/watch_directory';
import { run, setupTestDir, teardownTestDir, testContext } from './helpers';

describe('watchDirectory / pollDirectoryWatch', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: ['file.txt'], subdirs: ['watched'] });
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should register all event types by default', async () => {
    const ctx = testContext([testDir]);
    const result = await run(createWatchDirectoryTool(ctx), { path: `${testDir}/watched` });

    expect(result.data).toMatchObject({
      path: `${testDir}/watched`,
      eventTypes: ['CREATE', 'MODIFY', 'DELETE'],
      watching: true,
    });
    expect(ctx.watches.size).toBe(1);
  });

  it('should keep the requested subset in canonical order', async () => {
    const ctx = testContext([testDir]);
    const result = await run(createWatchDirectoryTool(ctx), {
      path: `${testDir}/watched`,
      eventTypes: ['DELETE', 'CREATE', 'DELETE'],
    });
    expect(result.data.eventTypes).toEqual(['CREATE', 'DELETE']);
  });

  it('should reject unknown event types', async () => {
    const ctx = testContext([testDir]);
    await expect(
      run(createWatchDirectoryTool(ctx), { path: `${testDir}/watched`, eventTypes: ['RENAME'] }),
    ).rejects.toThrow();
  });

  it('should require an existing directory', async () => {
    const watchDirectory = createWatchDirectoryTool(testContext([testDir]));
    await expect(run(watchDirectory, { path: `${testDir}/gone` })).rejects.toBeInstanceOf(NotFoundError);
    await expect(run(watchDirectory, { path: `${testDir}/file.txt` })).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('should poll a registered directory without events', async () => {
    const ctx = testContext([testDir]);
    await run(createWatchDirectoryTool(ctx), { path: `${testDir}/watched` });

    const result = await run(createPollDirectoryWatchTool(ctx), { path: `${testDir}/watched/` });
    expect(result.data).toEqual({ path: `${testDir}/watched`, watching: true, events: [] });
  });

  it('should report an unregistered directory as not watched', async () => {
    const ctx = testContext([testDir]);
    const result = await run(createPollDirectoryWatchTool(ctx), { path: `${testDir}/watched` });
    expect(result.data).toEqual({ path: `${testDir}/watched`, watching: false, events: [] });
  });
});
