import nodeFs from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';
import { errorMessage, Fs } from '@constify/shared';

export type FileSniff = { kind: 'text' } | { kind: 'binary' } | { kind: 'unreadable'; reason: string };

/**
 * Classifies a file by extension, then by a NUL byte in its first KiB.
 */
export async function sniffFile(filePath: string, fs: Fs = nodeFs): Promise<FileSniff> {
  if (isBinaryPath(filePath)) {
    return { kind: 'binary' };
  }

  try {
    const handle = await fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(1024);
      const { bytesRead } = await handle.read(buffer, 0, 1024, 0);
      return buffer.subarray(0, bytesRead).includes(0) ? { kind: 'binary' } : { kind: 'text' };
    } finally {
      await handle.close();
    }
  } catch (error) {
    return { kind: 'unreadable', reason: errorMessage(error) };
  }
}

export const DEFAULT_EXCLUDES = ['.git', 'target', 'build', '.idea'];

export const DEFAULT_EXTENSIONS = ['.java'];

export const IGNORE_FILENAME = '.constifyignore';
