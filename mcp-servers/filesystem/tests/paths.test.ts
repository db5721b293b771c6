import { describe, it, expect } from 'vitest';
import { FormatError } from '../../_shared/ts/errors';
import { PathNormalizer, toWindowsPath, toWslPath } from '../src/paths';

describe('PathNormalizer (posix style)', () => {
  const normalizer = new PathNormalizer({ style: 'posix', homeDirectory: '/home/tester', baseDirectory: '/data' });

  it.each([
    ['/data/a.txt', '/data/a.txt'],
    ['C:\\Users\\me\\file.txt', '/mnt/c/Users/me/file.txt'],
    ['d:/projects', '/mnt/d/projects'],
    ['C:', '/mnt/c'],
    ['notes/../a.txt', '/data/a.txt'],
    ['./a.txt', '/data/a.txt'],
    ['~', '/home/tester'],
    ['~/docs', '/home/tester/docs'],
    ['/data//x/./y/', '/data/x/y'],
    ['/', '/'],
    ['/..', '/'],
    ['/data/../../etc/passwd', '/etc/passwd'],
    ['  /data/padded  ', '/data/padded'],
  ])('normalize(%j) = %j', (raw, expected) => {
    expect(normalizer.normalize(raw)).toBe(expected);
  });

  it('should be idempotent', () => {
    const samples = ['C:\\Users\\me', 'a/b/../c', '~/x/', '/mnt/c/tmp', '/data//deep/./er/', '..'];
    for (const sample of samples) {
      const once = normalizer.normalize(sample);
      expect(normalizer.normalize(once)).toBe(once);
    }
  });

  it.each([[''], ['   '], ['a\0b']])('should reject %j', (raw) => {
    expect(() => normalizer.normalize(raw)).toThrow(FormatError);
  });

  it('should reject non-string input', () => {
    expect(() => normalizer.normalize(42)).toThrow('Path must be a string');
  });
});

describe('PathNormalizer (windows style)', () => {
  const normalizer = new PathNormalizer({ style: 'windows', homeDirectory: 'C:\\Users\\tester', baseDirectory: 'C:\\work' });

  it.each([
    ['/mnt/d/projects/x', 'D:/projects/x'],
    ['c:\\Users\\Me\\', 'C:/Users/Me'],
    ['src\\main.ts', 'C:/work/src/main.ts'],
    ['/mnt/c', 'C:/'],
    ['C:', 'C:/'],
    ['C:/a/../..', 'C:/'],
    ['~\\Desktop', 'C:/Users/tester/Desktop'],
  ])('normalize(%j) = %j', (raw, expected) => {
    expect(normalizer.normalize(raw)).toBe(expected);
  });

  it('should be idempotent', () => {
    for (const sample of ['/mnt/e/a/b/', 'rel\\path', 'C:\\x\\..\\y']) {
      const once = normalizer.normalize(sample);
      expect(normalizer.normalize(once)).toBe(once);
    }
  });
});

describe('path representations', () => {
  it('should convert between drive and mount forms', () => {
    expect(toWslPath('C:/Users/me')).toBe('/mnt/c/Users/me');
    expect(toWslPath('C:/')).toBe('/mnt/c');
    expect(toWindowsPath('/mnt/c/Users/me')).toBe('C:/Users/me');
    expect(toWindowsPath('/mnt/c')).toBe('C:/');
    expect(toWindowsPath('/srv/data')).toBe('/srv/data');
  });

  it('describe() reports every form', () => {
    const normalizer = new PathNormalizer({ style: 'windows', homeDirectory: 'C:/Users/tester', baseDirectory: 'C:/work' });
    expect(normalizer.describe('/mnt/c/tmp')).toEqual({
      original: '/mnt/c/tmp',
      normalized: 'C:/tmp',
      windows: 'C:/tmp',
      wsl: '/mnt/c/tmp',
    });
  });
});
