import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { isDirectory, isErrnoException, pathExists } from './fs';

describe('fs utils', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-utils-'));
    await fs.writeFile(path.join(testDir, 'file.txt'), 'x');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  test('pathExists should see files and directories', async () => {
    expect(await pathExists(path.join(testDir, 'file.txt'))).toBe(true);
    expect(await pathExists(testDir)).toBe(true);
    expect(await pathExists(path.join(testDir, 'nope'))).toBe(false);
  });

  test('pathExists should treat a path below a file as missing', async () => {
    expect(await pathExists(path.join(testDir, 'file.txt/child'))).toBe(false);
  });

  test('isDirectory should distinguish files from directories', async () => {
    expect(await isDirectory(testDir)).toBe(true);
    expect(await isDirectory(path.join(testDir, 'file.txt'))).toBe(false);
    expect(await isDirectory(path.join(testDir, 'nope'))).toBe(false);
  });

  test('isErrnoException should only accept errors with a code', () => {
    const error = Object.assign(new Error('gone'), { code: 'ENOENT' });
    expect(isErrnoException(error)).toBe(true);
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});
