import nodeFs from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export type Fs = typeof nodeFs;

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes `content` to a temporary sibling of `path` and renames it into place,
 * so readers only ever see the old or the new content in full.
 * The temporary file is removed if any step fails.
 */
export async function atomicWrite(
  path: string,
  content: string | Buffer,
  fs: Fs = nodeFs,
): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({
    dir: dirname(path),
    prefix: `.${basename(path)}.`,
    postfix: '.tmp',
  });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
