import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import ignore from 'ignore';
import { Fs, UsageError } from '@constify/shared';
import { SourceFileSet, SourceFileMeta, WalkOptions } from './types';
import { sniffFile, DEFAULT_EXCLUDES, DEFAULT_EXTENSIONS, IGNORE_FILENAME } from './utils';

export * from './types';
export { DEFAULT_EXCLUDES, DEFAULT_EXTENSIONS, IGNORE_FILENAME } from './utils';

/**
 * Collects candidate source files under a root, honouring the exclusion list,
 * `.gitignore` and `.constifyignore`.
 */
export class SourceWalker {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async collect(root: string, options: WalkOptions = {}): Promise<SourceFileSet> {
    const rootDir = path.resolve(root);
    await this.assertDirectory(rootDir);

    const extensions = new Set(
      (options.extensions ?? DEFAULT_EXTENSIONS).map((e) => e.toLowerCase()),
    );
    const ig = ignore();
    const warnings: string[] = [];

    // 1. Exclusion list (defaults when not configured)
    ig.add(options.excludes ?? DEFAULT_EXCLUDES);

    // 2. Ignore files at the root
    for (const name of ['.gitignore', IGNORE_FILENAME]) {
      try {
        ig.add(await this.fs.readFile(path.join(rootDir, name), 'utf-8'));
      } catch {
        // missing ignore files are fine
      }
    }

    const files: SourceFileMeta[] = [];

    const walk = async (dir: string, relativeDir: string) => {
      let entries: Dirent[];
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        warnings.push(`Cannot read directory ${relativeDir || '.'}: ${String(error)}`);
        return;
      }

      for (const entry of entries) {
        const entryRelativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

        if (entry.isDirectory()) {
          // For directories, append slash to match directory patterns in ignore
          if (ig.ignores(entryRelativePath + '/')) continue;
          await walk(path.join(dir, entry.name), entryRelativePath);
        } else if (entry.isFile()) {
          const ext = path.extname(entry.name);
          if (!extensions.has(ext.toLowerCase())) continue;
          if (ig.ignores(entryRelativePath)) continue;

          const absPath = path.join(dir, entry.name);
          let stats: Stats;
          try {
            stats = await this.fs.stat(absPath);
          } catch {
            continue; // Deleted during the walk
          }
          if (options.maxFileSize && stats.size > options.maxFileSize) {
            warnings.push(`Skipping large file: ${entryRelativePath} (${stats.size} bytes)`);
            continue;
          }
          const sniff = await sniffFile(absPath, this.fs);
          if (sniff.kind === 'binary') {
            warnings.push(`Skipping binary file: ${entryRelativePath}`);
            continue;
          }
          if (sniff.kind === 'unreadable') {
            warnings.push(`Cannot read ${entryRelativePath}: ${sniff.reason}`);
            continue;
          }

          files.push({ path: entryRelativePath, absPath, sizeBytes: stats.size, ext });
        }
      }
    };

    await walk(rootDir, '');

    // Sort files for stability (deterministic order)
    files.sort((a, b) => a.path.localeCompare(b.path));

    return { root: rootDir, files, warnings };
  }

  private async assertDirectory(dir: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await this.fs.stat(dir);
    } catch (error) {
      throw new UsageError(`Source root does not exist: ${dir}`, { cause: error });
    }
    if (!stats.isDirectory()) {
      throw new UsageError(`Source root is not a directory: ${dir}`);
    }
  }
}
