import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import nodeFs from 'node:fs/promises';
import * as path from 'path';
import * as os from 'os';
import { CommitError, type Fs } from '@constify/shared';
import { CommitWriter } from './writer';

describe('CommitWriter', () => {
  let tmpDir: string;
  let target: string;

  beforeEach(async () => {
    tmpDir = await nodeFs.mkdtemp(path.join(os.tmpdir(), 'constify-commit-test-'));
    target = path.join(tmpDir, 'Main.java');
    await nodeFs.writeFile(target, 'original');
  });

  afterEach(async () => {
    await nodeFs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('dry-run', () => {
    it('writes a .new sibling and leaves the original untouched', async () => {
      const writer = new CommitWriter();

      const receipt = await writer.commit(target, 'rewritten', 'dry-run');

      expect(receipt).toEqual({ policy: 'dry-run', outputPath: `${target}.new` });
      expect(await nodeFs.readFile(target, 'utf8')).toBe('original');
      expect(await nodeFs.readFile(`${target}.new`, 'utf8')).toBe('rewritten');
      expect((await nodeFs.readdir(tmpDir)).sort()).toEqual(['Main.java', 'Main.java.new']);
    });
  });

  describe('overwrite', () => {
    it('replaces the original and leaves no temp files', async () => {
      const writer = new CommitWriter();

      const receipt = await writer.commit(target, 'rewritten', 'overwrite');

      expect(receipt).toEqual({ policy: 'overwrite', outputPath: target });
      expect(await nodeFs.readFile(target, 'utf8')).toBe('rewritten');
      expect(await nodeFs.readdir(tmpDir)).toEqual(['Main.java']);
    });

    it('is idempotent when the same text is committed twice', async () => {
      const writer = new CommitWriter();

      await writer.commit(target, 'rewritten', 'overwrite');
      const once = await nodeFs.readFile(target);
      await writer.commit(target, 'rewritten', 'overwrite');

      expect(await nodeFs.readFile(target)).toEqual(once);
      expect(await nodeFs.readdir(tmpDir)).toEqual(['Main.java']);
    });

    it('keeps the original byte-identical when the rename fails after the temp write', async () => {
      const failingFs: Fs = {
        ...nodeFs,
        rename: vi.fn().mockRejectedValue(new Error('simulated crash')),
      };
      const writer = new CommitWriter(failingFs);

      await expect(writer.commit(target, 'rewritten', 'overwrite')).rejects.toThrow(CommitError);

      expect(await nodeFs.readFile(target, 'utf8')).toBe('original');
      expect(await nodeFs.readdir(tmpDir)).toEqual(['Main.java']);
    });

    it('keeps the original when the temp write itself fails', async () => {
      const failingFs: Fs = {
        ...nodeFs,
        writeFile: vi.fn().mockRejectedValue(new Error('ENOSPC')),
      };
      const writer = new CommitWriter(failingFs);

      const error = await writer.commit(target, 'rewritten', 'overwrite').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommitError);
      expect(error instanceof CommitError && error.path).toBe(target);
      expect(error instanceof CommitError && error.message).toBe(
        `Writing ${target} failed: ENOSPC`,
      );
      expect(await nodeFs.readFile(target, 'utf8')).toBe('original');
    });
  });

  describe('overwrite-with-backup', () => {
    it('copies the original aside before replacing it', async () => {
      const writer = new CommitWriter();

      const receipt = await writer.commit(target, 'rewritten', 'overwrite-with-backup');

      expect(receipt).toEqual({
        policy: 'overwrite-with-backup',
        outputPath: target,
        backupPath: `${target}.bak`,
      });
      expect(await nodeFs.readFile(target, 'utf8')).toBe('rewritten');
      expect(await nodeFs.readFile(`${target}.bak`, 'utf8')).toBe('original');
    });

    it('aborts before touching the original when the backup fails', async () => {
      const writeFile = vi.fn();
      const failingFs: Fs = {
        ...nodeFs,
        copyFile: vi.fn().mockRejectedValue(new Error('EACCES')),
        writeFile,
      };
      const writer = new CommitWriter(failingFs);

      await expect(writer.commit(target, 'rewritten', 'overwrite-with-backup')).rejects.toThrow(
        `Backup to ${target}.bak failed: EACCES`,
      );

      expect(writeFile).not.toHaveBeenCalled();
      expect(await nodeFs.readFile(target, 'utf8')).toBe('original');
      expect(await nodeFs.readdir(tmpDir)).toEqual(['Main.java']);
    });
  });
});
