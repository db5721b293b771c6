import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { ConfigError, DEFAULTS, defaultPathStyle, loadConfig } from '../src/config';

const env = (vars: Record<string, string> = {}): NodeJS.ProcessEnv => ({ FS_GATEWAY_PATH_STYLE: 'posix', ...vars });

describe('loadConfig', () => {
  it('should read allowed directories from the environment', () => {
    const config = loadConfig(env({ FS_GATEWAY_ALLOWED_DIRS: ['/srv/a', '/srv/b/'].join(path.delimiter) }), [], '/work');
    expect(config.allowedDirectories).toEqual(['/srv/a', '/srv/b']);
  });

  it('should let positional arguments replace the environment list', () => {
    const config = loadConfig(env({ FS_GATEWAY_ALLOWED_DIRS: '/srv/a' }), ['--verbose', '/opt/data'], '/work');
    expect(config.allowedDirectories).toEqual(['/opt/data']);
  });

  it('should resolve relative directories and drop duplicates', () => {
    const config = loadConfig(env(), ['docs', '/work/docs', './src/../src'], '/work');
    expect(config.allowedDirectories).toEqual(['/work/docs', '/work/src']);
  });

  it('should resolve directories against the project root', () => {
    const config = loadConfig(env({ FS_GATEWAY_PROJECT_ROOT: 'project' }), ['assets'], '/work');
    expect(config.activeProjectRoot).toBe('/work/project');
    expect(config.allowedDirectories).toEqual(['/work/project/assets']);
  });

  it('should fail when no directory is allowed', () => {
    expect(() => loadConfig(env(), [], '/work')).toThrow(ConfigError);
    expect(() => loadConfig(env({ FS_GATEWAY_ALLOWED_DIRS: ' ' }), [], '/work')).toThrow(
      'No allowed directories configured',
    );
  });

  it('should apply defaults', () => {
    const config = loadConfig(env(), ['/data'], '/work');
    expect(config).toMatchObject({
      maxFileSizeMb: DEFAULTS.maxFileSizeMb,
      writeEnabled: false,
      symlinksAllowed: false,
      activeProjectRoot: null,
      pathStyle: 'posix',
      maxListResults: 100,
      maxSearchResults: 50,
      maxMatchesPerFile: 10,
      maxLineLength: 1000,
      scriptCommands: [],
      scriptTimeoutMs: 30_000,
    });
  });

  it('should parse flags and numbers', () => {
    const config = loadConfig(
      env({
        FS_GATEWAY_ENABLE_WRITE: 'Yes',
        FS_GATEWAY_ALLOW_SYMLINKS: '0',
        FS_GATEWAY_MAX_FILE_SIZE_MB: '2.5',
        FS_GATEWAY_MAX_SEARCH_RESULTS: '7',
        FS_GATEWAY_SCRIPT_COMMANDS: 'git, ls ,,',
      }),
      ['/data'],
      '/work',
    );
    expect(config.writeEnabled).toBe(true);
    expect(config.symlinksAllowed).toBe(false);
    expect(config.maxFileSizeMb).toBe(2.5);
    expect(config.maxSearchResults).toBe(7);
    expect(config.scriptCommands).toEqual(['git', 'ls']);
  });

  it.each([
    ['FS_GATEWAY_ENABLE_WRITE', 'maybe'],
    ['FS_GATEWAY_MAX_FILE_SIZE_MB', 'large'],
    ['FS_GATEWAY_MAX_LIST_RESULTS', '-3'],
    ['FS_GATEWAY_MAX_LINE_LENGTH', '1.5'],
    ['FS_GATEWAY_PATH_STYLE', 'mac'],
  ])('should reject %s=%s', (name, value) => {
    expect(() => loadConfig(env({ [name]: value }), ['/data'], '/work')).toThrow(`Invalid configuration: ${name}:`);
  });

  it('should return a frozen configuration', () => {
    const config = loadConfig(env(), ['/data'], '/work');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.allowedDirectories)).toBe(true);
  });

  it('should normalize windows-style directories in windows style', () => {
    const config = loadConfig({ FS_GATEWAY_PATH_STYLE: 'windows' }, ['C:\\Data\\Reports', '/mnt/d/logs'], 'C:\\work');
    expect(config.allowedDirectories).toEqual(['C:/Data/Reports', 'D:/logs']);
  });
});

describe('defaultPathStyle', () => {
  it('should pick windows only on win32', () => {
    expect(defaultPathStyle('win32')).toBe('windows');
    expect(defaultPathStyle('linux')).toBe('posix');
    expect(defaultPathStyle('darwin')).toBe('posix');
  });
});
