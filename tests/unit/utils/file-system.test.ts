/**
 * Tests for file system helpers.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileExists, readFile } from '../../../src/utils/file-system.js';

describe('file-system', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `optbind-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read a file as text', async () => {
    const file = join(testDir, 'a.txt');
    await writeFile(file, 'hello');

    expect(await readFile(file)).toBe('hello');
  });

  it('should report whether a file exists', async () => {
    const file = join(testDir, 'b.txt');
    await writeFile(file, '');

    expect(await fileExists(file)).toBe(true);
    expect(await fileExists(join(testDir, 'missing.txt'))).toBe(false);
  });
});
