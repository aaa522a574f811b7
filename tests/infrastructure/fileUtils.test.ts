import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { errorCode, fileExists, writeFileAtomic } from '../../src/infrastructure/storage/fileUtils.js';

describe('fileUtils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-utils-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('writeFileAtomic', () => {
    it('should create missing parent directories', async () => {
      const target = path.join(dir, 'nested', 'state.json');

      await writeFileAtomic(target, '{}');

      expect(await fs.readFile(target, 'utf-8')).toBe('{}');
    });

    it('should let overlapping writes to one path all succeed', async () => {
      const target = path.join(dir, 'state.json');
      const contents = Array.from({ length: 10 }, (_, i) => `write-${i}`);

      await Promise.all(contents.map(content => writeFileAtomic(target, content)));

      expect(contents).toContain(await fs.readFile(target, 'utf-8'));
      expect(await fs.readdir(dir)).toEqual(['state.json']);
    });

    it('should remove its temp file when the rename fails', async () => {
      const target = path.join(dir, 'taken');
      await fs.mkdir(path.join(target, 'child'), { recursive: true });

      await expect(writeFileAtomic(target, 'data')).rejects.toThrow();

      expect(await fs.readdir(dir)).toEqual(['taken']);
    });
  });

  it('should report whether a file exists', async () => {
    const target = path.join(dir, 'present.txt');
    await fs.writeFile(target, 'x');

    expect(await fileExists(target)).toBe(true);
    expect(await fileExists(path.join(dir, 'absent.txt'))).toBe(false);
  });

  it('should read the errno code only from errors that carry one', async () => {
    const failure = await fs.readFile(path.join(dir, 'absent.txt')).then(() => undefined, (error: unknown) => error);

    expect(errorCode(failure)).toBe('ENOENT');
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
  });
});
